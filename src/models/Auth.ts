export interface Credentials {
  clientId: string;
  clientSecret: string;
}

/**
 * Respuesta del endpoint de tokens (flujo client credentials)
 */
export interface TokenResponse {
  access_token: string;
  token_type?: string;
  expires_in?: number;
}
