import type { Request, Response } from 'express';
import type { AuthFlow } from '../../oauth/auth-flow.js';
import { renderLoggedOutPage } from '../pages.js';

export function makeLogoutHandler(authFlow: AuthFlow) {
  return async (req: Request, res: Response): Promise<void> => {
    const result = await authFlow.logout();
    res.type('html').send(renderLoggedOutPage(result.login));
  };
}
