import * as dotenv from 'dotenv';
import * as fs from 'fs';
import { Injectable, Logger } from '@nestjs/common';

@Injectable()
export class ConfigService {
  private readonly logger = new Logger(ConfigService.name);
  private readonly envConfig: Record<string, string>;

  constructor(overrides?: Record<string, string>) {
    if (overrides) {
      this.envConfig = { ...overrides };
      return;
    }

    const envFile = process.env.NODE_ENV === 'production'
      ? '.env.production'
      : '.env.development';

    const fromProcess = Object.fromEntries(
      Object.entries(process.env).filter((entry): entry is [string, string] => entry[1] !== undefined),
    );

    try {
      // process.env wins over the file so deployments can override single keys
      this.envConfig = { ...dotenv.parse(fs.readFileSync(envFile)), ...fromProcess };
    } catch {
      this.logger.warn(`Failed to load ${envFile}, using process.env`);
      this.envConfig = fromProcess;
    }
  }

  get(key: string): string {
    const value = this.envConfig[key];
    if (value === undefined || value === '') {
      throw new Error(`Configuration error: Missing required environment variable ${key}`);
    }
    return value;
  }

  getOptional(key: string, fallback = ''): string {
    const value = this.envConfig[key];
    return value === undefined || value === '' ? fallback : value;
  }

  getNumber(key: string, fallback: number): number {
    const parsed = Number.parseInt(this.getOptional(key), 10);
    return Number.isNaN(parsed) ? fallback : parsed;
  }

  getList(key: string, fallback: string[] = []): string[] {
    const raw = this.getOptional(key);
    if (!raw) return fallback;
    return raw.split(',').map((s) => s.trim()).filter(Boolean);
  }
}
