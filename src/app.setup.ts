import { INestApplication } from '@nestjs/common';
import { KUMRU_CONFIG, KumruConfig } from './kumru/kumru.config';

/** Applies the HTTP settings shared by the server and the e2e tests. */
export function setupApp(app: INestApplication): KumruConfig {
  const config = app.get<KumruConfig>(KUMRU_CONFIG);
  app.enableCors();
  if (config.apiPrefix) {
    app.setGlobalPrefix(config.apiPrefix);
  }
  return config;
}
