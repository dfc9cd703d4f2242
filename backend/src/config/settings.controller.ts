import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Post,
} from '@nestjs/common';
import { z } from 'zod';
import {
  RagSettingsService,
  SettingsValidationError,
} from './rag-settings.service.js';

const settingsPatchSchema = z.object({
  chunking: z.record(z.unknown()).optional(),
  retrieval: z.record(z.unknown()).optional(),
  prompt: z.record(z.unknown()).optional(),
  generation: z.record(z.unknown()).optional(),
});

@Controller('api/v1/settings')
export class SettingsController {
  constructor(private readonly settings: RagSettingsService) {}

  @Get()
  current() {
    return { revision: this.settings.version, data: this.settings.current() };
  }

  @Post('reload')
  @HttpCode(HttpStatus.OK)
  reload(@Body() body: unknown) {
    const parsed = settingsPatchSchema.safeParse(body);
    if (!parsed.success) {
      throw new BadRequestException(parsed.error.message);
    }
    try {
      const data = this.settings.reload(parsed.data);
      return { revision: this.settings.version, data };
    } catch (error) {
      if (error instanceof SettingsValidationError) {
        throw new BadRequestException(error.message);
      }
      throw error;
    }
  }
}
