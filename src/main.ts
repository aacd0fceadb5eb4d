import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { GatewayServerService } from './gateway/gateway-server.service';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { logConfigurationSummary } from './config/config.utils';
import type { PodgateConfiguration } from './config/config.types';

/**
 * BootStrap
 */
async function bootstrap() {
  const logger = new Logger('bootstrap');

  try {
    // Create NestJS app but don't call listen() - servers are managed by GatewayServerService
    const isDevelopment = process.env.NODE_ENV === 'development';
    const app = await NestFactory.create<NestExpressApplication>(AppModule, {
      logger: isDevelopment ? ['log', 'error', 'warn', 'debug', 'verbose'] : ['log', 'error', 'warn'],
    });

    app.enableShutdownHooks();

    const config = app.get<ConfigService>(ConfigService);
    const gatewayServerService = app.get<GatewayServerService>(GatewayServerService);
    const podgateConfig = config.getOrThrow<PodgateConfiguration>('podgate');

    const shutdown = async (signal: string) => {
      logger.log(`Received ${signal}, starting graceful shutdown`);
      try {
        await app.close();
        logger.log('Application closed successfully');
        process.exit(0);
      } catch (shutdownError) {
        const message = shutdownError instanceof Error ? shutdownError.message : String(shutdownError);
        const stack = shutdownError instanceof Error ? shutdownError.stack : undefined;
        logger.error(`Error during shutdown: ${message}`, stack);
        process.exit(1);
      }
    };

    const handleSignal = (signal: NodeJS.Signals) => {
      void shutdown(signal);
    };

    process.on('SIGTERM', handleSignal);
    process.on('SIGINT', handleSignal);

    if (podgateConfig.environment === 'development') {
      logger.log(`RUNNING IN DEVELOPMENT MODE`);
      logConfigurationSummary(podgateConfig);

      const swaggerConfig = new DocumentBuilder()
        .setTitle('Podgate API')
        .setDescription('Admin API of the Podgate TLS gateway.')
        .setVersion('1.0')
        .addApiKey({ type: 'apiKey', name: 'X-API-Key', in: 'header' }, 'api-key')
        .build();
      const document = SwaggerModule.createDocument(app, swaggerConfig);
      SwaggerModule.setup('api-docs', app, document);
      logger.log('Swagger UI is available at /api-docs');
    }

    // Initialize the app (triggers OnModuleInit lifecycle hooks)
    await app.init();

    logger.log(`Starting Podgate`);
    await gatewayServerService.initializeServers(app);

    logger.log('Podgate is ready');
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    const errorStack = error instanceof Error ? error.stack : undefined;
    logger.error(`Failed to bootstrap application: ${errorMessage}`, errorStack);
    process.exit(1);
  }
}
bootstrap().catch((error) => {
  const logger = new Logger('bootstrap');
  const errorMessage = error instanceof Error ? error.message : String(error);
  logger.error(`Unhandled bootstrap error: ${errorMessage}`);
  process.exit(1);
});
