/**
 * Browser routes for the GitHub login
 *
 * Only mounted when the server runs over HTTP; a stdio server has no
 * browser-facing endpoint for GitHub to redirect to.
 */

import type { Express, NextFunction, Request, Response } from 'express';
import type { AuthFlow } from '../oauth/auth-flow.js';
import { makeCallbackHandler } from './route-handlers/callback.js';
import { makeLoginHandler } from './route-handlers/login.js';
import { makeLogoutHandler } from './route-handlers/logout.js';
import { makeStatusHandler } from './route-handlers/status.js';

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function forwardErrors(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

export function registerAuthRoutes(app: Express, authFlow: AuthFlow): void {
  app.get('/auth/login', makeLoginHandler(authFlow));
  app.get('/auth/callback', forwardErrors(makeCallbackHandler(authFlow)));
  app.get('/auth/status', makeStatusHandler(authFlow));
  app.get('/auth/logout', forwardErrors(makeLogoutHandler(authFlow)));
}

export { makeCallbackHandler, makeLoginHandler, makeLogoutHandler, makeStatusHandler };
