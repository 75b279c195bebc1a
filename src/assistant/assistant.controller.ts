import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  Headers,
  HttpCode,
  Post,
} from '@nestjs/common';
import { AssistantSessionService } from './assistant-session.service';
import type { RetrievalOrchestrator, SystemInfo } from './retrieval-orchestrator';
import type {
  AnswerResult,
  ConversationTurn,
  SearchHit,
} from './assistant.types';
import type {
  AddDocumentResult,
  LoadDocumentsResult,
  RemoveDocumentResult,
} from '../knowledge-base/knowledge-base.types';
import { InvalidSearchParameterError } from '../vector-store/vector-store.errors';
import {
  AddDocumentRequestDto,
  AskRequestDto,
  ChatRequestDto,
  LoadDocumentsRequestDto,
  RemoveDocumentRequestDto,
  SearchRequestDto,
} from './dto/assistant-request.dto';

@Controller('assistant')
export class AssistantController {
  constructor(private readonly sessions: AssistantSessionService) {}

  @Post('documents/load')
  @HttpCode(200)
  loadDocuments(
    @Headers('x-session-id') sessionId: string | undefined,
    @Body() body: LoadDocumentsRequestDto,
  ): Promise<LoadDocumentsResult> {
    return this.session(sessionId).loadDocuments(body.path);
  }

  @Post('documents')
  addDocument(
    @Headers('x-session-id') sessionId: string | undefined,
    @Body() body: AddDocumentRequestDto,
  ): Promise<AddDocumentResult> {
    return this.session(sessionId).addDocument(body.path);
  }

  @Delete('documents')
  removeDocument(
    @Headers('x-session-id') sessionId: string | undefined,
    @Body() body: RemoveDocumentRequestDto,
  ): Promise<RemoveDocumentResult> {
    return this.session(sessionId).removeDocument(body.sourceFile);
  }

  @Post('ask')
  @HttpCode(200)
  ask(
    @Headers('x-session-id') sessionId: string | undefined,
    @Body() body: AskRequestDto,
  ): Promise<AnswerResult> {
    return this.session(sessionId).ask(body.question, {
      includeSources: body.includeSources,
    });
  }

  @Post('search')
  @HttpCode(200)
  async search(
    @Headers('x-session-id') sessionId: string | undefined,
    @Body() body: SearchRequestDto,
  ): Promise<SearchHit[]> {
    try {
      return await this.session(sessionId).search(body.query, body.k);
    } catch (error) {
      if (error instanceof InvalidSearchParameterError) {
        throw new BadRequestException(error.message);
      }
      throw error;
    }
  }

  @Post('chat')
  @HttpCode(200)
  chat(
    @Headers('x-session-id') sessionId: string | undefined,
    @Body() body: ChatRequestDto,
  ): Promise<AnswerResult> {
    return this.session(sessionId).chat(body.message);
  }

  @Post('conversation/reset')
  @HttpCode(204)
  resetConversation(
    @Headers('x-session-id') sessionId: string | undefined,
  ): void {
    this.session(sessionId).resetConversation();
  }

  @Get('conversation')
  getConversationHistory(
    @Headers('x-session-id') sessionId: string | undefined,
  ): ConversationTurn[] {
    return this.session(sessionId).getConversationHistory();
  }

  @Get('system')
  getSystemInfo(
    @Headers('x-session-id') sessionId: string | undefined,
  ): Promise<SystemInfo> {
    return this.session(sessionId).getSystemInfo();
  }

  private session(sessionId: string | undefined): RetrievalOrchestrator {
    return this.sessions.getOrCreate(sessionId || undefined);
  }
}
