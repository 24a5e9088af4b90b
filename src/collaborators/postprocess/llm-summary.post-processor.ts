/**
 * LLM Summary Post-Processor
 * One short summary per crawled page, written to `summaries.json` beside the
 * other artifacts. A page whose summary fails is left out of the file.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ChatPromptTemplate } from '@langchain/core/prompts';
import { StringOutputParser } from '@langchain/core/output_parsers';
import { errorMessage } from '../../common/errors/crawl-prime.errors';
import {
  ARTIFACT_WRITER,
  type ArtifactWriter,
  type PostProcessContext,
  type PostProcessor,
  type PostProcessResult,
  type StructuredDocument,
} from '../collaborator.interfaces';
import { documentSections } from '../mapping/html-structure.mapper';
import { LLMProviderFactory } from '../providers/llm-provider.factory';

const MAX_INPUT_CHARS = 6000;

export interface PageSummary {
  url: string;
  title: string;
  summary: string;
}

export function summaryInput(document: StructuredDocument): string {
  return documentSections(document)
    .map((section) => `## ${section.heading}\n${section.text}`)
    .join('\n\n')
    .slice(0, MAX_INPUT_CHARS);
}

@Injectable()
export class LlmSummaryPostProcessor implements PostProcessor {
  readonly name = 'summarize';
  private readonly logger = new Logger(LlmSummaryPostProcessor.name);

  private readonly prompt = ChatPromptTemplate.fromMessages([
    [
      'system',
      'Summarize the web page below in 3 sentences or fewer. Return only the summary.',
    ],
    ['user', 'Title: {title}\n\n{content}'],
  ]);

  constructor(
    private readonly llmFactory: LLMProviderFactory,
    @Inject(ARTIFACT_WRITER) private readonly artifactWriter: ArtifactWriter,
  ) {}

  async process(
    documents: StructuredDocument[],
    context: PostProcessContext,
  ): Promise<PostProcessResult> {
    const chain = this.prompt
      .pipe(this.llmFactory.createChatModel('summary'))
      .pipe(new StringOutputParser());

    const summaries: PageSummary[] = [];
    for (const document of documents) {
      const content = summaryInput(document);
      if (!content) {
        continue;
      }
      try {
        const summary = await chain.invoke({ title: document.title, content });
        summaries.push({
          url: document.url,
          title: document.title,
          summary: summary.trim(),
        });
      } catch (error) {
        this.logger.warn(
          `[Summarize] skipped url=${document.url} error=${errorMessage(error)}`,
        );
      }
    }

    if (summaries.length === 0 && documents.length > 0) {
      throw new Error('no page could be summarized');
    }

    const path = await this.artifactWriter.writeJson(
      context.artifactDir,
      'summaries.json',
      { url: context.url, collection: context.collection, summaries },
    );
    this.logger.log(
      `[Summarize] url=${context.url} summaries=${summaries.length}/${documents.length}`,
    );
    return { artifacts: [path] };
  }
}
