import { Module } from '@nestjs/common';
import { MongodbService } from './mongodb.service';
import {
  MONGO_CLIENT_FACTORY,
  createMongoClient,
} from './internal/mongodb.client';

/**
 * Thin, typed bridge to the native MongoDB driver.
 * Exports the service for the readiness and initialisation modules.
 */
@Module({
  providers: [
    { provide: MONGO_CLIENT_FACTORY, useValue: createMongoClient },
    MongodbService,
  ],
  exports: [MongodbService],
})
export class MongodbModule {}
