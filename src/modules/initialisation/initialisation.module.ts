import { Module } from '@nestjs/common';
import { MongodbModule } from '../mongodb/mongodb.module';
import { ReadinessModule } from '../readiness/readiness.module';
import { InitialisationService } from './initialisation.service';

@Module({
  imports: [MongodbModule, ReadinessModule],
  providers: [InitialisationService],
  exports: [InitialisationService],
})
export class InitialisationModule {}
