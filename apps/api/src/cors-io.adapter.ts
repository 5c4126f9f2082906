import { INestApplicationContext } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { IoAdapter } from '@nestjs/platform-socket.io';
import { Server, ServerOptions } from 'socket.io';

/**
 * Reads API_CORS_ORIGIN: `*`, a single origin, or a comma-separated list.
 * Shared by the HTTP server and the socket.io gateways.
 */
export function corsOriginFromEnv(configService: ConfigService): string | string[] {
  const raw = configService.get<string>('API_CORS_ORIGIN', '*').trim();
  if (raw === '' || raw === '*') return '*';

  const origins = raw
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
  return origins.length === 1 ? origins[0] : origins;
}

/** Sets `origin` as the socket.io CORS origin, keeping the other options. */
export function withCorsOrigin(
  options: Partial<ServerOptions> | undefined,
  origin: string | string[],
): Partial<ServerOptions> {
  return { ...options, cors: { origin } };
}

/** socket.io adapter giving every gateway the same CORS origin as the HTTP API. */
export class CorsIoAdapter extends IoAdapter {
  private readonly origin: string | string[];

  constructor(app: INestApplicationContext) {
    super(app);
    this.origin = corsOriginFromEnv(app.get(ConfigService));
  }

  createIOServer(port: number, options?: Partial<ServerOptions>): Server {
    return super.createIOServer(port, withCorsOrigin(options, this.origin));
  }
}
