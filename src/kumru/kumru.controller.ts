import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { KumruService } from './kumru.service';
import { AskRequest, HealthResponse, KumruResponse } from './kumru.types';

@Controller()
export class KumruController {
  constructor(private readonly kumruService: KumruService) {}

  @Get('kumru/health')
  healthCheck(): HealthResponse {
    return { status: 'Kumru router is healthy' };
  }

  @Post('llm/kumru/ask')
  @HttpCode(HttpStatus.OK)
  async ask(@Body() request: AskRequest): Promise<KumruResponse> {
    if (typeof request?.question !== 'string') {
      throw new BadRequestException('Body must be a JSON object with a string "question" field');
    }
    return this.kumruService.ask(request.question);
  }

  @Post('llm/kumru/send_documents')
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(FileInterceptor('file'))
  async sendDocuments(@UploadedFile() file: Express.Multer.File | undefined): Promise<KumruResponse> {
    return this.kumruService.transcribeDocument(this.requireFile(file).buffer);
  }

  @Post('llm/kumru/send_pdf')
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(FileInterceptor('file'))
  async sendPdf(@UploadedFile() file: Express.Multer.File | undefined): Promise<KumruResponse> {
    return this.kumruService.transcribePdf(this.requireFile(file).buffer);
  }

  private requireFile(file: Express.Multer.File | undefined): Express.Multer.File {
    if (!file) {
      throw new BadRequestException('No file uploaded');
    }
    return file;
  }
}
