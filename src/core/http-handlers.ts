import type http from 'node:http';

import createRouter from 'find-my-way';

import { log, logJsonl } from '../common/logger.js';

/**
 * Methods routed to a registered handler. Everything else falls through to 404.
 */
export const ROUTED_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS'] as const;

export type HttpHandler = (req: http.IncomingMessage, res: http.ServerResponse) => void;

export interface HttpHandlerRegistry {
  /**
   * `exactMatch` binds only `prefix` itself; otherwise every path starting with `prefix`.
   */
  register(prefix: string, exactMatch: boolean, handler: HttpHandler): void;
  unregister(prefix: string, exactMatch: boolean): boolean;
  lookup: http.RequestListener;
}

function routePath(prefix: string, exactMatch: boolean): string {
  return exactMatch ? prefix : `${prefix}*`;
}

export function createHttpHandlerRegistry(onNotFound: HttpHandler): HttpHandlerRegistry {
  const router = createRouter({
    defaultRoute(req, res) {
      onNotFound(req, res);
    },
  });

  const registered = new Set<string>();

  return {
    register(prefix, exactMatch, handler) {
      const path = routePath(prefix, exactMatch);
      if (registered.has(path)) {
        throw new Error(`HTTP handler already registered: ${path}`);
      }

      router.on([...ROUTED_METHODS], path, (req, res) => {
        handler(req, res);
      });
      registered.add(path);

      log('INFO', `Registered HTTP handler ${path}`);
      logJsonl('INFO', 'http_handler_registered', { prefix, exactMatch });
    },

    unregister(prefix, exactMatch) {
      const path = routePath(prefix, exactMatch);
      if (!registered.delete(path)) {
        return false;
      }

      router.off([...ROUTED_METHODS], path);
      logJsonl('INFO', 'http_handler_unregistered', { prefix, exactMatch });
      return true;
    },

    lookup(req, res) {
      router.lookup(req, res);
    },
  };
}
