import { Module } from '@nestjs/common';
import { MulterModule } from '@nestjs/platform-express';
import { KUMRU_CONFIG, KumruConfig, KumruConfigModule } from './kumru.config';
import { KumruController } from './kumru.controller';
import { KumruService } from './kumru.service';
import { OllamaClient } from './ollama.client';
import { PdfPageReader } from './pdf-page.reader';

@Module({
  imports: [
    KumruConfigModule,
    MulterModule.registerAsync({
      imports: [KumruConfigModule],
      inject: [KUMRU_CONFIG],
      useFactory: (config: KumruConfig) => ({
        limits: { fileSize: config.maxUploadBytes },
      }),
    }),
  ],
  controllers: [KumruController],
  providers: [KumruService, OllamaClient, PdfPageReader],
})
export class KumruModule {}
