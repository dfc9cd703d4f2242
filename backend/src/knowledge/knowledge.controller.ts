import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  NotFoundException,
  Param,
  Post,
  Res,
} from '@nestjs/common';
import type { Response } from 'express';
import { KnowledgeService, type IngestDocumentInput } from './knowledge.service.js';
import {
  ingestBatchSchema,
  ingestDocumentSchema,
  type IngestDocumentDto,
} from './dto/ingest-document.dto.js';

function toInput(payload: IngestDocumentDto): IngestDocumentInput {
  return {
    sourceUri: payload.sourceUri,
    mimeType: payload.mimeType,
    bytes: new Uint8Array(Buffer.from(payload.content, 'base64')),
    title: payload.title,
    metadata: payload.metadata,
  };
}

@Controller('api/v1/knowledge')
export class KnowledgeController {
  constructor(private readonly knowledgeService: KnowledgeService) {}

  @Get('documents')
  async listDocuments() {
    const documents = await this.knowledgeService.listDocuments();
    return { data: documents };
  }

  @Post('documents')
  async ingestDocument(
    @Body() body: unknown,
    @Res({ passthrough: true }) res: Response,
  ) {
    const parsed = ingestDocumentSchema.safeParse(body);
    if (!parsed.success) {
      throw new BadRequestException(parsed.error.message);
    }

    const result = await this.knowledgeService.ingest(toInput(parsed.data));
    res.status(
      result.status === 'accepted'
        ? HttpStatus.CREATED
        : HttpStatus.UNPROCESSABLE_ENTITY,
    );
    return result;
  }

  @Post('documents/batch')
  @HttpCode(HttpStatus.OK)
  async ingestBatch(@Body() body: unknown) {
    const parsed = ingestBatchSchema.safeParse(body);
    if (!parsed.success) {
      throw new BadRequestException(parsed.error.message);
    }

    const results = await this.knowledgeService.ingestMany(
      parsed.data.documents.map(toInput),
    );
    return {
      accepted: results.filter((result) => result.status === 'accepted').length,
      rejected: results.filter((result) => result.status === 'rejected').length,
      data: results,
    };
  }

  @Delete('documents/:id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async removeDocument(@Param('id') id: string): Promise<void> {
    const removed = await this.knowledgeService.removeDocument(id);
    if (!removed) {
      throw new NotFoundException(`Document ${id} not found`);
    }
  }
}
