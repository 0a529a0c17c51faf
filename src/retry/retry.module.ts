import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module';
import { RetryPolicyService } from './retry-policy.service';

@Module({
  imports: [ConfigModule],
  providers: [RetryPolicyService],
  exports: [RetryPolicyService],
})
export class RetryModule {}
