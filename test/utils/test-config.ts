import { ConfigService } from '@nestjs/config';
import { OrchestratorConfigService } from '../../src/config/orchestrator-config.service';

/** Config service over explicit values instead of the environment. */
export function testConfig(
  values: Record<string, string | number | boolean> = {},
): OrchestratorConfigService {
  return new OrchestratorConfigService(new ConfigService(values));
}
