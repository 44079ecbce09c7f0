/**
 * Sentry Error Tracking Configuration
 *
 * Set the SENTRY_DSN environment variable to enable Sentry.
 * Without a DSN, Sentry stays disabled and errors are only logged.
 */

import * as Sentry from '@sentry/node';
import type { Application } from 'express';
import * as functions from 'firebase-functions';

const SENTRY_DSN = process.env.SENTRY_DSN || '';

let isInitialized = false;

/**
 * Initialize Sentry once, before the Express app is built.
 */
export function initSentry(): void {
    if (isInitialized) {
        return;
    }

    if (!SENTRY_DSN) {
        functions.logger.info('[sentry] SENTRY_DSN not configured. Error tracking disabled.');
        isInitialized = true;
        return;
    }

    Sentry.init({
        dsn: SENTRY_DSN,
        environment: process.env.NODE_ENV || 'development',
        tracesSampleRate: process.env.NODE_ENV === 'production' ? 0.1 : 1.0,
        enabled: process.env.NODE_ENV !== 'test',

        // Utterances can name a user's medicines; never ship request bodies.
        beforeSend(event) {
            if (event.request?.data) {
                event.request.data = '[REDACTED]';
            }
            return event;
        },

        ignoreErrors: ['ECONNRESET', 'ETIMEDOUT'],
    });

    functions.logger.info('[sentry] Sentry initialized successfully');
    isInitialized = true;
}

/**
 * Log an exception and, when Sentry is enabled, report it with context.
 */
export function captureException(
    error: unknown,
    context?: Record<string, unknown>,
): void {
    functions.logger.error('[error]', error);

    if (!SENTRY_DSN) {
        return;
    }

    Sentry.withScope((scope) => {
        Object.entries(context ?? {}).forEach(([key, value]) => {
            scope.setExtra(key, value);
        });
        Sentry.captureException(error);
    });
}

/**
 * Call AFTER all routes but BEFORE the custom error handler.
 */
export function setupSentryErrorHandler(app: Application): void {
    if (!SENTRY_DSN) return;
    Sentry.setupExpressErrorHandler(app);
}
