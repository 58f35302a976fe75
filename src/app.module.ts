import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { initConfigFrom } from './config/init.config';
import { InitialisationModule } from './modules/initialisation/initialisation.module';

@Module({})
export class AppModule {
  /** Root module with the `init` config namespace read from `env`. */
  public static register(env: NodeJS.ProcessEnv = process.env): DynamicModule {
    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot({ isGlobal: true, load: [initConfigFrom(env)] }),
        InitialisationModule,
      ],
    };
  }
}
