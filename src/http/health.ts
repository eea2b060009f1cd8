import type { Express, Request, Response } from 'express';

import { config } from '../config/index.js';

export interface HealthResponse {
  status: 'ok';
  name: string;
  uptime: number;
}

function roundTo(value: number, precision: number): number {
  const factor = 10 ** precision;
  return Math.round(value * factor) / factor;
}

export function buildHealthResponse(): HealthResponse {
  return {
    status: 'ok',
    name: config.server.name,
    uptime: roundTo(process.uptime(), 3),
  };
}

export function registerHealthRoute(app: Express): void {
  app.get('/healthz', (_req: Request, res: Response) => {
    res.json(buildHealthResponse());
  });
}
