/**
 * Express wiring for the HTTP routes.
 */
import express, {Express, Request, Response} from 'express';
import {AppEffects} from '../pure/effects';
import {internalError} from './http';
import {createRoutes, Handler} from './routes';
import {CartSessionStore} from './sessions';

function toExpressHandler(handler: Handler) {
  return async (req: Request, res: Response) => {
    try {
      const response = await handler({ params: req.params, query: req.query, body: req.body });
      res.status(response.status).json(response.body);
    } catch (error) {
      console.error(`❌ ${req.method} ${req.path} failed:`, error);
      res.status(internalError.status).json(internalError.body);
    }
  };
}

export function createApp(effects: AppEffects, sessions: CartSessionStore = new CartSessionStore()): Express {
  const app = express();

  // Parse JSON bodies
  app.use(express.json());

  for (const route of createRoutes(effects, sessions)) {
    const handle = toExpressHandler(route.handler);
    switch (route.method) {
      case 'get':
        app.get(route.path, handle);
        break;
      case 'post':
        app.post(route.path, handle);
        break;
      case 'patch':
        app.patch(route.path, handle);
        break;
      case 'delete':
        app.delete(route.path, handle);
        break;
    }
  }

  return app;
}
