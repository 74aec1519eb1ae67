import 'dotenv/config';

export const config = {
  port: parseInt(process.env.PORT || '3002', 10),
  corsOrigin: process.env.CORS_ORIGIN || 'http://localhost:5174',
} as const;
