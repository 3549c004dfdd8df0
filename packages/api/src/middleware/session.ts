/**
 * Session middleware
 * Resolves the caller's MeetingSession from the session cookie
 */
import { createMiddleware } from 'hono/factory';
import { getCookie, setCookie } from 'hono/cookie';
import type { SessionStore } from '../services/session-store';
import type { AppEnv } from '../types';

export const SESSION_COOKIE = 'briefing_session';

export function sessionMiddleware(store: SessionStore) {
  return createMiddleware<AppEnv>(async (c, next) => {
    const { session, created } = store.getOrCreate(getCookie(c, SESSION_COOKIE));

    if (created) {
      c.get('logger').debug('session_created', { session_id: session.session_id });
    }

    setCookie(c, SESSION_COOKIE, session.session_id, {
      httpOnly: true,
      sameSite: 'Lax',
      path: '/',
      maxAge: store.ttlSeconds,
    });

    c.set('session', session);
    await next();
  });
}
