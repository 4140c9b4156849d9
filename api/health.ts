import type { VercelRequest, VercelResponse } from '@vercel/node';
import { checkDatabaseConnection } from '../src/lib/db';

export default async function handler(_req: VercelRequest, res: VercelResponse): Promise<void> {
  const database = await checkDatabaseConnection();
  res.status(200).json({
    status: 'ok',
    version: '1.0.0',
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    database,
  });
}
