import { Logger, Module, OnModuleInit } from '@nestjs/common';
import { promises as fs } from 'fs';
import * as path from 'path';
import { ConfigModule } from '../config/config.module';
import { OrchestratorConfigService } from '../config/orchestrator-config.service';
import { ConnectorRegistry } from './connector-registry.service';
import { JsonFileSourceConnector } from './json-file.connector';

@Module({
  imports: [ConfigModule],
  providers: [ConnectorRegistry],
  exports: [ConnectorRegistry],
})
export class ConnectorsModule implements OnModuleInit {
  private readonly logger = new Logger(ConnectorsModule.name);

  constructor(
    private readonly registry: ConnectorRegistry,
    private readonly config: OrchestratorConfigService,
  ) {}

  /**
   * Every `<source>.json` export under SOURCE_DATA_DIR becomes a source.
   */
  async onModuleInit() {
    const dataDir = this.config.sourceDataDir;
    const entries = await fs.readdir(dataDir).catch((): string[] => {
      this.logger.warn(`📂 No source exports found at ${dataDir}`);
      return [];
    });
    const sourceIds = entries
      .filter((entry) => entry.endsWith('.json'))
      .map((entry) => path.basename(entry, '.json'));

    if (sourceIds.length > 0) {
      this.registry.register(new JsonFileSourceConnector(dataDir, sourceIds));
    }
  }
}
