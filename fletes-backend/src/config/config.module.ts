import { Global, Module } from '@nestjs/common';
import { ConfigService } from './config.service';
import { AwsService } from './aws.service';
import { Clock } from '../common/clock';

@Global()
@Module({
  providers: [ConfigService, AwsService, Clock],
  exports: [ConfigService, AwsService, Clock],
})
export class ConfigModule {}
