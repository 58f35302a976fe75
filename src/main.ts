// src/main.ts
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { bootstrap, describeError, EXIT_FAILURE } from './app.runner';

bootstrap().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    new Logger('Bootstrap').error(describeError(err));
    process.exitCode = EXIT_FAILURE;
  },
);
