/* security.ts — helmet + CORS policy for the cluster monitor server */

import helmet from 'helmet';
import cors from 'cors';
import type { Express } from 'express';

const isDev = process.env.NODE_ENV !== 'production';

/** Dashboard origins allowed in production, from MONITOR_ORIGINS (comma separated) */
export function allowedOrigins(raw = process.env.MONITOR_ORIGINS): string[] {
  if (!raw) return [];
  return raw
    .split(',')
    .map(o => o.trim())
    .filter(o => o.length > 0);
}

/**
 * Development accepts any origin. Production accepts only the listed
 * dashboards, or none (same-origin) when the list is empty.
 */
export function corsOrigin(): boolean | string[] {
  if (isDev) return true;
  const origins = allowedOrigins();
  return origins.length > 0 ? origins : false;
}

/**
 * Configure security middleware (helmet + CORS).
 * Must be called BEFORE other middleware / route registration.
 */
export function setupSecurity(app: Express): void {
  app.use(helmet());

  const origin = corsOrigin();
  if (origin !== false) {
    app.use(
      cors({
        origin,
        methods: ['GET', 'POST', 'OPTIONS'],
        credentials: true,
      }),
    );
  }
}

/** Socket.io CORS config mirroring the HTTP policy above */
export function getSocketCorsConfig(): { origin: boolean | string[]; methods: string[] } {
  return { origin: corsOrigin(), methods: ['GET', 'POST'] };
}
