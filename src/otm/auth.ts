/**
 * OTM REST credentials. Every call carries HTTP Basic auth; there is no token to cache.
 */

export interface OtmCredentials {
  username: string;
  password: string;
}

export function basicAuthHeader(credentials: OtmCredentials): string {
  const encoded = Buffer.from(`${credentials.username}:${credentials.password}`, "utf-8").toString(
    "base64"
  );
  return `Basic ${encoded}`;
}
