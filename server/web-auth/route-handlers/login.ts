/**
 * Login Endpoint Factory
 *
 * Starts the GitHub login: issues a state token and redirects the browser
 * to GitHub's authorization page.
 *
 * Usage:
 *   app.get('/auth/login', makeLoginHandler(authFlow));
 */

import type { Request, Response } from 'express';
import type { AuthFlow } from '../../oauth/auth-flow.js';
import { errorMessage } from '../../oauth/errors.js';
import { logger } from '../../observability/logger.js';
import { renderErrorPage } from '../pages.js';

export function makeLoginHandler(authFlow: AuthFlow) {
  return (req: Request, res: Response): void => {
    try {
      const { url } = authFlow.startLogin();
      logger.info('[LOGIN] Redirecting to GitHub');
      res.redirect(url);
    } catch (error) {
      logger.error('[LOGIN] Could not start login', { error: errorMessage(error) });
      res.status(500).type('html').send(
        renderErrorPage('Configuration Error', [
          ['', errorMessage(error)],
          ['', 'Please check your GitHub OAuth configuration.'],
        ]),
      );
    }
  };
}
