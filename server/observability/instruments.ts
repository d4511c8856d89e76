import * as Sentry from '@sentry/node';
import { loadSentrySettings } from '../config.js';

const settings = loadSentrySettings();

Sentry.init({
  dsn: settings.dsn,
  enabled: settings.enabled,
  environment: settings.environment,
  release: settings.release,
  tracesSampleRate: settings.tracesSampleRate,
});
