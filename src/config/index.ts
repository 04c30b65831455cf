import dotenv from 'dotenv';
import type { AppConfig } from '../types';
import boxCatalog from './boxes.json';

dotenv.config();

function parseOrigins(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);
}

export const config: AppConfig = {
  port: parseInt(process.env.PORT || '8000', 10),
  jsonLimit: process.env.JSON_LIMIT || '1mb',
  corsOrigins: parseOrigins(process.env.CORS_ORIGINS),
  boxes: boxCatalog.boxes,
};

export const isDebug = process.env.DEBUG === 'true';
export const isDevelopment = process.env.NODE_ENV === 'development';
