/**
 * HTTP surface tests: the Express app is built around a stubbed actions port
 * and driven with supertest.
 */

import { jest, describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import request from 'supertest';
import {
  ConfigurationMissingError,
  IntegrationNotFoundError,
  TransientTransportError,
} from '@wildlife-telemetry/domain';
import type { IntegrationActionsPort } from '@wildlife-telemetry/domain';
import { buildApp } from '../app.js';

function stubActions() {
  return {
    pullObservations: jest.fn<IntegrationActionsPort['pullObservations']>(),
    processObservations: jest.fn<IntegrationActionsPort['processObservations']>(),
    getFileStatus: jest.fn<IntegrationActionsPort['getFileStatus']>(),
    setFileStatus: jest.fn<IntegrationActionsPort['setFileStatus']>(),
    reprocessFile: jest.fn<IntegrationActionsPort['reprocessFile']>(),
  };
}

describe('actions controller', () => {
  let actions: ReturnType<typeof stubActions>;
  let app: ReturnType<typeof buildApp>;

  beforeEach(() => {
    actions = stubActions();
    app = buildApp({ actions }, { accessLog: false });
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('GET /healthz answers ok', async () => {
    const res = await request(app).get('/healthz');
    expect(res.status).toBe(200);
    expect(res.body.status).toBe('ok');
  });

  describe('POST /api/integrations/:id/actions/pull_observations', () => {
    it('returns the staged file names', async () => {
      actions.pullObservations.mockResolvedValue({
        observations_extracted: 3,
        transmissions_file: 'a_transmissions.xml',
        data_points_file: 'a_data_points.xml',
      });

      const res = await request(app).post('/api/integrations/int-1/actions/pull_observations').send({});

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        observations_extracted: 3,
        transmissions_file: 'a_transmissions.xml',
        data_points_file: 'a_data_points.xml',
      });
      expect(actions.pullObservations).toHaveBeenCalledWith('int-1');
    });

    it('maps missing configuration to 422', async () => {
      actions.pullObservations.mockRejectedValue(new ConfigurationMissingError('Authentication settings are missing.'));

      const res = await request(app).post('/api/integrations/int-1/actions/pull_observations');

      expect(res.status).toBe(422);
      expect(res.body).toEqual({ error: 'Authentication settings are missing.', type: 'ConfigurationMissingError' });
    });

    it('maps an exhausted vendor retry to 502', async () => {
      actions.pullObservations.mockRejectedValue(new TransientTransportError('Vendor endpoint answered 503', 503));

      const res = await request(app).post('/api/integrations/int-1/actions/pull_observations');

      expect(res.status).toBe(502);
      expect(res.body.type).toBe('TransientTransportError');
    });
  });

  describe('POST /api/integrations/:id/actions/process_observations', () => {
    it('passes an optional filename through', async () => {
      actions.processObservations.mockResolvedValue({ observations_processed: 12 });

      const res = await request(app)
        .post('/api/integrations/int-1/actions/process_observations')
        .send({ filename: 'a_data_points.xml' });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ observations_processed: 12 });
      expect(actions.processObservations).toHaveBeenCalledWith('int-1', { filename: 'a_data_points.xml' });
    });

    it('processes all pending files when no filename is given', async () => {
      actions.processObservations.mockResolvedValue({ observations_processed: 0 });

      const res = await request(app).post('/api/integrations/int-1/actions/process_observations').send({});

      expect(res.status).toBe(200);
      expect(actions.processObservations).toHaveBeenCalledWith('int-1', {});
    });
  });

  describe('file status routes', () => {
    it('reads a file status', async () => {
      actions.getFileStatus.mockResolvedValue({ file_status: 'pending' });

      const res = await request(app)
        .post('/api/integrations/int-1/actions/get_file_status')
        .send({ filename: 'test_file.xml' });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ file_status: 'pending' });
    });

    it('rejects a body without a filename', async () => {
      const res = await request(app).post('/api/integrations/int-1/actions/get_file_status').send({});

      expect(res.status).toBe(400);
      expect(res.body.error).toBe('validation_error');
      expect(actions.getFileStatus).not.toHaveBeenCalled();
    });

    it('sets a file status', async () => {
      actions.setFileStatus.mockResolvedValue({
        file_status: 'processed',
        message: "File status for 'test_file.xml' in integration 'int-1' set to 'processed'.",
      });

      const res = await request(app)
        .post('/api/integrations/int-1/actions/set_file_status')
        .send({ filename: 'test_file.xml', status: 'processed' });

      expect(res.status).toBe(200);
      expect(actions.setFileStatus).toHaveBeenCalledWith('int-1', { filename: 'test_file.xml', status: 'processed' });
    });

    it('rejects an unknown status', async () => {
      const res = await request(app)
        .post('/api/integrations/int-1/actions/set_file_status')
        .send({ filename: 'test_file.xml', status: 'done' });

      expect(res.status).toBe(400);
      expect(actions.setFileStatus).not.toHaveBeenCalled();
    });

    it('maps an unknown integration to 404', async () => {
      actions.getFileStatus.mockRejectedValue(new IntegrationNotFoundError('int-404'));

      const res = await request(app)
        .post('/api/integrations/int-404/actions/get_file_status')
        .send({ filename: 'test_file.xml' });

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: "Integration 'int-404' not found.", type: 'IntegrationNotFoundError' });
    });
  });

  it('POST reprocess_file returns the action result', async () => {
    actions.reprocessFile.mockResolvedValue({
      observations_processed: 0,
      message: "Reprocess for file 'test_file.xml' failed. Error: Test exception.",
    });

    const res = await request(app)
      .post('/api/integrations/int-1/actions/reprocess_file')
      .send({ filename: 'test_file.xml' });

    expect(res.status).toBe(200);
    expect(res.body.message).toBe("Reprocess for file 'test_file.xml' failed. Error: Test exception.");
  });

  it('answers 404 for an action this service does not expose', async () => {
    const res = await request(app).post('/api/integrations/int-1/actions/auth').send({});

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: "Unknown action 'auth'" });
  });

  it('answers 500 for an unexpected error', async () => {
    actions.getFileStatus.mockRejectedValue(new Error('connection reset'));

    const res = await request(app)
      .post('/api/integrations/int-1/actions/get_file_status')
      .send({ filename: 'test_file.xml' });

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ error: 'connection reset' });
  });
});
