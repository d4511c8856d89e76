/**
 * OAuth Callback Endpoint Factory
 *
 * Handles GitHub's redirect after the user authorizes (or refuses) the app.
 *
 * Key Responsibilities:
 * - Report provider-side errors (`error`, `error_description`)
 * - Reject callbacks without `code` or `state`
 * - Complete the login through AuthFlow (state check, code exchange, session)
 * - Abandon the exchange if the browser disconnects
 *
 * Usage:
 *   app.get('/auth/callback', makeCallbackHandler(authFlow));
 */

import type { Request, Response } from 'express';
import type { AuthFlow } from '../../oauth/auth-flow.js';
import { errorMessage, httpStatusForError, InvalidStateError } from '../../oauth/errors.js';
import { logger } from '../../observability/logger.js';
import { renderErrorPage, renderLoginSuccessPage } from '../pages.js';

function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

export function makeCallbackHandler(authFlow: AuthFlow) {
  return async (req: Request, res: Response): Promise<void> => {
    const code = queryString(req, 'code');
    const state = queryString(req, 'state');
    const providerError = queryString(req, 'error');

    logger.info('[CALLBACK] GitHub OAuth callback received', {
      hasCode: !!code,
      hasState: !!state,
      providerError,
    });

    if (providerError) {
      const description = queryString(req, 'error_description') ?? providerError;
      res.status(400).type('html').send(
        renderErrorPage('Authentication Failed', [
          ['Error', providerError],
          ['Description', description],
        ]),
      );
      return;
    }

    if (!code || !state) {
      res.status(400).type('html').send(
        renderErrorPage('Invalid Request', [['', 'Missing required parameters (code or state).']]),
      );
      return;
    }

    // Abandon the exchange if the browser goes away mid-flight
    const controller = new AbortController();
    const onClose = () => {
      if (!res.writableFinished) {
        controller.abort(new Error('Client disconnected'));
      }
    };
    res.on('close', onClose);

    try {
      const session = await authFlow.completeLogin({ code, state }, { signal: controller.signal });
      res.type('html').send(renderLoginSuccessPage(session));
    } catch (error) {
      if (error instanceof InvalidStateError) {
        logger.warn('[CALLBACK] Rejected callback with invalid state');
        res.status(400).type('html').send(
          renderErrorPage('Invalid or Expired State', [
            ['', 'The authentication state is invalid or has expired. This could be a CSRF attack attempt.'],
          ]),
        );
        return;
      }

      logger.error('[CALLBACK] GitHub OAuth callback failed', { error: errorMessage(error) });
      res.status(httpStatusForError(error)).type('html').send(
        renderErrorPage('Authentication Error', [['Error', errorMessage(error)]]),
      );
    } finally {
      res.off('close', onClose);
    }
  };
}
