import type { Request, Response } from 'express';
import type { AuthFlow } from '../../oauth/auth-flow.js';
import { renderNotAuthenticatedPage, renderStatusPage } from '../pages.js';

export function makeStatusHandler(authFlow: AuthFlow) {
  return (req: Request, res: Response): void => {
    const status = authFlow.status();
    if (!status.authenticated) {
      res.type('html').send(renderNotAuthenticatedPage());
      return;
    }
    res.type('html').send(renderStatusPage(status.session));
  };
}
