export type ThrottlerConfig = {
  ttl: number; // milliseconds
  limit: number; // requests per ttl
};
