import { Module } from '@nestjs/common';
import { KnowledgeBaseModule } from '../knowledge-base/knowledge-base.module';
import { ProvidersModule } from '../providers/providers.module';
import { AssistantController } from './assistant.controller';
import { AssistantSessionService } from './assistant-session.service';
import { ConversationChainService } from './chains/conversation-chain.service';
import { AskWorkflowService } from './workflow/ask-workflow.service';

@Module({
  imports: [KnowledgeBaseModule, ProvidersModule],
  controllers: [AssistantController],
  providers: [
    AskWorkflowService,
    ConversationChainService,
    AssistantSessionService,
  ],
  exports: [AssistantSessionService],
})
export class AssistantModule {}
