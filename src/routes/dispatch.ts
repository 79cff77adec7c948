// src/routes/dispatch.ts
export const RESOURCE_NAME = 'squirrels';

export type RouteAction =
  | { action: 'index' }
  | { action: 'retrieve'; id: string }
  | { action: 'create' }
  | { action: 'update'; id: string }
  | { action: 'delete'; id: string }
  | { action: 'methodNotAllowed' }
  | { action: 'notFound' };

export interface ParsedPath {
  resourceName: string;
  resourceId?: string;
}

/**
 * Splits a request target into resource name and optional id.
 *
 *   /squirrels       -> { resourceName: 'squirrels' }
 *   /squirrels/      -> { resourceName: 'squirrels' }
 *   /squirrels/12    -> { resourceName: 'squirrels', resourceId: '12' }
 *   /                -> { resourceName: '' }
 *
 * The target is split as-is, so a query string stays part of its segment
 * (`/squirrels?x=1` names the resource `squirrels?x=1`). Segments past the id are ignored.
 */
export function parsePath(url: string): ParsedPath {
  if (!url.startsWith('/')) return { resourceName: '' };

  const [resourceName = '', resourceId] = url.slice(1).split('/');
  if (resourceId) return { resourceName, resourceId };
  return { resourceName };
}

export function dispatch(method: string, url: string): RouteAction {
  // PATCH is refused before the path is even looked at
  if (method === 'PATCH') return { action: 'methodNotAllowed' };

  const { resourceName, resourceId } = parsePath(url);
  if (resourceName !== RESOURCE_NAME) return { action: 'notFound' };

  switch (method) {
    case 'GET':
      return resourceId ? { action: 'retrieve', id: resourceId } : { action: 'index' };
    case 'POST':
      return resourceId ? { action: 'notFound' } : { action: 'create' };
    case 'PUT':
      return resourceId ? { action: 'update', id: resourceId } : { action: 'notFound' };
    case 'DELETE':
      return resourceId ? { action: 'delete', id: resourceId } : { action: 'notFound' };
    default:
      return { action: 'notFound' };
  }
}
