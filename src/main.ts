import 'dotenv/config';
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { AllConfigType } from './config/config.type';
import { StatementExtractionService } from './statement-extraction/statement-extraction.service';

// Boots the extraction core without an HTTP listener. The company catalogue
// is loaded and validated while the context starts; a bad catalogue exits
// with a non-zero code before any document is processed.
async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule);
  app.enableShutdownHooks();

  const configService = app.get(ConfigService<AllConfigType>);
  const extraction = app.get(StatementExtractionService);

  new Logger('Bootstrap').log(
    `${configService.getOrThrow('app.name', { infer: true })} ready for: ${extraction.supportedCompanies().join(', ')}`,
  );

  await app.close();
}
void bootstrap();
