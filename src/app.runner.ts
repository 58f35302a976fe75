import { Logger, type INestApplicationContext } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { resolveLogLevels } from './config/init.config';
import { MongoActionError } from './lib/errors/MongoActionError';
import { InitialisationService } from './modules/initialisation/initialisation.service';

const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

/** One log line for any thrown value; Mongo errors carry their context. */
export function describeError(err: unknown): string {
  if (err instanceof MongoActionError) return err.summary();
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}

/**
 * Runs the initialisation job inside a built app context and maps the result
 * to a process exit code. The context is closed either way.
 */
export async function runInitialiser(
  app: INestApplicationContext,
  logger: Logger = new Logger('Initialiser'),
): Promise<number> {
  try {
    const outcome = await app.get(InitialisationService).run();
    logger.log(
      `Finished with status '${outcome.status}' (database=${outcome.database}, user=${outcome.user}).`,
    );
    return EXIT_OK;
  } catch (err) {
    logger.error(
      `Initialisation failed. ${describeError(err)}`,
      err instanceof Error ? err.stack : undefined,
    );
    return EXIT_FAILURE;
  } finally {
    await app.close();
  }
}

/**
 * Builds the app context (no HTTP listener) over `env` and runs the job.
 * A context that fails to build, e.g. on invalid config, yields EXIT_FAILURE.
 */
export async function bootstrap(
  env: NodeJS.ProcessEnv = process.env,
  logger: Logger = new Logger('Bootstrap'),
): Promise<number> {
  const app = await NestFactory.createApplicationContext(
    AppModule.register(env),
    {
      logger: resolveLogLevels(env.LOG_LEVEL),
      abortOnError: false,
    },
  ).catch((err: unknown) => {
    logger.error(`Failed to start. ${describeError(err)}`);
    return undefined;
  });
  if (!app) return EXIT_FAILURE;

  return runInitialiser(app);
}
