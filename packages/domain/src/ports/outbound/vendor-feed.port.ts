export interface VendorCredentials {
  username: string;
  password: string;
}

export interface VendorFeedPort {
  /** GET the endpoint with the vendor's credentials and return the raw body. */
  fetchXml(endpoint: string, credentials: VendorCredentials): Promise<string>;
}
