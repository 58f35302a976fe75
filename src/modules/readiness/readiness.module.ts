import { Module } from '@nestjs/common';
import { MongodbModule } from '../mongodb/mongodb.module';
import { ReadinessService } from './readiness.service';

@Module({
  imports: [MongodbModule],
  providers: [ReadinessService],
  exports: [ReadinessService],
})
export class ReadinessModule {}
