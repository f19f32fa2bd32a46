export type AuthConfig = {
  secret?: string;
  // JWT standards (RFC 7519)
  jwtIssuer?: string;
  jwtAudience?: string;
};
