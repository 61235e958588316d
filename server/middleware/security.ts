/**
 * Security Middleware
 * 
 * Session cookie settings and baseline security headers for the chat API.
 */

import type { Request, Response, NextFunction } from 'express';
import { SESSION_CONSTANTS } from '../config/constants';

/**
 * Session cookie configuration with SameSite protection.
 */
export function getSecureCookieConfig() {
    return {
        httpOnly: true,
        secure: process.env.NODE_ENV === 'production',
        sameSite: 'strict' as const,
        maxAge: SESSION_CONSTANTS.SESSION_TTL_MS,
    };
}

/**
 * Session secret. Required in production; development falls back to a
 * fixed placeholder so the server starts without setup.
 */
export function getSessionSecret(): string {
    const secret = process.env.SESSION_SECRET;
    if (secret) {
        return secret;
    }
    if (process.env.NODE_ENV === 'production') {
        throw new Error('[Security] SESSION_SECRET environment variable is not set');
    }
    console.warn('[Security] SESSION_SECRET not set, using development placeholder');
    return SESSION_CONSTANTS.DEV_SESSION_SECRET;
}

/**
 * Adds essential security headers to all responses.
 * Rendered chat fragments are HTML, so the API never allows framing or sniffing.
 */
export function addSecurityHeaders(_req: Request, res: Response, next: NextFunction) {
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin');
    res.setHeader('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");
    next();
}
