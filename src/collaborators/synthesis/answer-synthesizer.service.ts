/**
 * Answer Synthesizer Service
 * Grounded answer generation over retrieved web chunks with a LangChain chat
 * model. Sources are numbered in the prompt so the answer can cite them.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ChatPromptTemplate } from '@langchain/core/prompts';
import { StringOutputParser } from '@langchain/core/output_parsers';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import type {
  AnswerSynthesizer,
  RetrievalHit,
} from '../collaborator.interfaces';
import { LLMProviderFactory } from '../providers/llm-provider.factory';

export const NO_CONTEXT_ANSWER =
  'No indexed web content matches this question yet.';

const SYSTEM_PROMPT = `You answer questions using only the numbered web excerpts provided.

Rules:
1. Cite excerpts inline as [n] where n is the excerpt number
2. If the excerpts do not contain the answer, say so plainly
3. Do not invent URLs, names or figures that are not in the excerpts
4. Keep the answer concise and in the language of the question`;

export function formatContext(hits: RetrievalHit[]): string {
  return hits
    .map(
      (hit, index) =>
        `[${index + 1}] ${hit.title || hit.url}\nURL: ${hit.url}\n${hit.content}`,
    )
    .join('\n\n---\n\n');
}

@Injectable()
export class AnswerSynthesizerService implements AnswerSynthesizer {
  private readonly logger = new Logger(AnswerSynthesizerService.name);
  private chat: BaseChatModel | null = null;

  private readonly prompt = ChatPromptTemplate.fromMessages([
    ['system', SYSTEM_PROMPT],
    ['user', 'Excerpts:\n\n{context}\n\nQuestion: {query}\n\nAnswer:'],
  ]);

  constructor(private readonly llmFactory: LLMProviderFactory) {}

  async synthesize(query: string, hits: RetrievalHit[]): Promise<string> {
    if (hits.length === 0) {
      return NO_CONTEXT_ANSWER;
    }

    const startTime = Date.now();
    const chain = this.prompt
      .pipe(this.getChatModel())
      .pipe(new StringOutputParser());
    const answer = await chain.invoke({ query, context: formatContext(hits) });

    this.logger.log(
      `[Synthesize] sources=${hits.length} answer_length=${answer.length} duration=${Date.now() - startTime}ms`,
    );
    return answer.trim();
  }

  private getChatModel(): BaseChatModel {
    if (!this.chat) {
      this.chat = this.llmFactory.createChatModel('synthesis');
    }
    return this.chat;
  }
}
