import { ConfigService } from '@nestjs/config';
import {
  buildConfiguration,
  validateEnv,
  type AppConfig,
} from '../config/index.js';

/**
 * A ConfigService built from the given variables only, validated the same
 * way the application validates its environment.
 */
export function createTestConfigService(
  env: Record<string, string> = {},
): ConfigService<AppConfig> {
  const config = buildConfiguration(
    validateEnv({ NODE_ENV: 'test', OPENAI_API_KEY: 'test-secret', ...env }),
  );
  return new ConfigService<AppConfig>(config);
}
