import * as Sentry from '@sentry/node';
import { config } from './index';
import { logger } from '../utils/logger';
import { isUserFacingError } from '../utils/errors';

let initialized = false;

export function initSentry(): void {
    if (!config.sentry.dsn) {
        logger.debug('[Sentry] DSN not configured, skipping initialization');
        return;
    }

    Sentry.init({
        dsn: config.sentry.dsn,
        environment: config.env,
        tracesSampleRate: config.sentry.tracesSampleRate,

        beforeSend(event, hint) {
            // Bad input is reported to the user, not to Sentry
            if (isUserFacingError(hint.originalException)) {
                return null;
            }
            return event;
        }
    });

    initialized = true;
    logger.debug('[Sentry] Initialized');
}

/**
 * Report an unexpected failure and wait for delivery before the process exits
 */
export async function reportError(error: unknown): Promise<void> {
    if (!initialized) {
        return;
    }
    Sentry.captureException(error);
    await Sentry.flush(2000);
}

export { Sentry };
