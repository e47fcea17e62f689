import configManager from './app';

const rateLimitConfig = configManager.getRateLimitConfig();
const securityOptions = configManager.getSecurityConfig();

export const securityConfig = {
  // Rate limiting, applied per user and endpoint
  rateLimitWindow: rateLimitConfig.windowMs,
  maxRequestsPerWindow: rateLimitConfig.maxRequests,

  // Allowed origins for CORS
  allowedOrigins: securityOptions.allowedOrigins,

  // Content limits
  maxRequestSize: securityOptions.maxRequestSize,
};
