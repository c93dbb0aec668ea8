// engine/contract/paths.ts — Endpoint identity: (method, path-template) keys and normalization

/** Every path parameter collapses to this token before comparison. */
export const PARAM_TOKEN = '{param}';

const PATH_PARAM = /\{[^}]+\}/g;

/**
 * Rewrite every `{...}` segment to `{param}` so that `/users/{id}` and
 * `/users/{user_id}` compare equal.
 */
export function normalizePath(path: string): string {
  return path.replace(PATH_PARAM, PARAM_TOKEN);
}

export function pathsMatch(a: string, b: string): boolean {
  return normalizePath(a) === normalizePath(b);
}

/** "GET /users/{id}" */
export function endpointKey(method: string, path: string): string {
  return `${method} ${path}`;
}

/** "get-users-id" */
export function endpointId(method: string, path: string): string {
  const slug = path
    .replace(/[{}:]/g, '')
    .split('/')
    .filter(Boolean)
    .join('-');
  return slug ? `${method.toLowerCase()}-${slug}` : `${method.toLowerCase()}-root`;
}

export function splitSegments(path: string): string[] {
  return path.replace(/^\/+|\/+$/g, '').split('/');
}
