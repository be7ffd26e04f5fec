/**
 * Paths removed from every log line.
 * Request bodies carrying credentials, the session cookie and the CSRF header
 * never reach log storage.
 */
export const REDACTED_LOG_PATHS = [
  'password',
  'currentPassword',
  'newPassword',
  'token',
  'csrfToken',
  '*.password',
  '*.currentPassword',
  '*.newPassword',
  '*.csrfToken',
  'req.headers.cookie',
  'req.headers["x-csrftoken"]',
  'req.headers.authorization',
  'res.headers["set-cookie"]',
];
