import { Logger, Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module';
import { OrchestratorConfigService } from '../config/orchestrator-config.service';
import { DatabaseService } from './database.service';
import { InMemoryStore } from './in-memory.store';
import { PersistenceStore } from './persistence.store';
import { PostgresStore } from './postgres.store';

@Module({
  imports: [ConfigModule],
  providers: [
    DatabaseService,
    {
      provide: PersistenceStore,
      inject: [OrchestratorConfigService, DatabaseService],
      useFactory: (
        config: OrchestratorConfigService,
        db: DatabaseService,
      ): PersistenceStore => {
        new Logger('DatabaseModule').log(
          `💾 Persistence driver: ${config.persistenceDriver}`,
        );
        return config.persistenceDriver === 'postgres'
          ? new PostgresStore(db)
          : new InMemoryStore();
      },
    },
  ],
  exports: [DatabaseService, PersistenceStore],
})
export class DatabaseModule {}
