import { Injectable } from '@nestjs/common';

function numberFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) {
    return fallback;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

@Injectable()
export class ConfigService {
  get awsRegion(): string {
    return process.env.AWS_REGION || 'us-east-1';
  }

  get activeLinesTableName(): string {
    return process.env.ACTIVE_LINES_TABLE_NAME || 'fletes-pedidos-dev';
  }

  get completedLinesTableName(): string {
    return process.env.COMPLETED_LINES_TABLE_NAME || 'fletes-pedidos-completados-dev';
  }

  get catalogTableName(): string {
    return process.env.CATALOG_TABLE_NAME || 'fletes-catalogo-dev';
  }

  get usersTableName(): string {
    return process.env.USERS_TABLE_NAME || 'fletes-usuarios-dev';
  }

  get tariffCacheTtlMs(): number {
    return numberFromEnv('TARIFF_CACHE_TTL_MS', 60_000);
  }

  get requestDeadlineMs(): number {
    return numberFromEnv('REQUEST_DEADLINE_MS', 25_000);
  }

  get dispatchTimeZone(): string {
    return process.env.DISPATCH_TIME_ZONE || 'America/Bogota';
  }

  get allowedOrigins(): string {
    return process.env.ALLOWED_ORIGINS || '*';
  }

  get port(): number {
    return numberFromEnv('PORT', 3000);
  }

  get nodeEnv(): string {
    return process.env.NODE_ENV || 'development';
  }

  get isProduction(): boolean {
    return this.nodeEnv === 'production';
  }
}
