/**
 * default paths of the oauth endpoints
 * @description relative to the prefix the plugin is registered under.
 */
export const DEFAULT_ROUTES = {
  authorize: '/authorize',
  token: '/token',
  refresh: '/refresh',
} as const;
