import { FakeListChatModel } from '@langchain/core/utils/testing';
import { ConfigService } from '@nestjs/config';
import type {
  ArtifactWriter,
  StructuredDocument,
} from '../collaborator.interfaces';
import { LLMProviderFactory } from '../providers/llm-provider.factory';
import {
  LlmSummaryPostProcessor,
  summaryInput,
} from './llm-summary.post-processor';

class FakeLLMProviderFactory extends LLMProviderFactory {
  constructor(private readonly responses: string[]) {
    super(new ConfigService());
  }

  createChatModel(): FakeListChatModel {
    return new FakeListChatModel({ responses: this.responses });
  }
}

function doc(url: string, paragraph: string | null): StructuredDocument {
  return {
    url,
    title: 'Guide',
    crawledAt: '',
    links: [],
    nodes: [
      {
        tag: 'section',
        text: 'Setup',
        children: paragraph
          ? [{ tag: 'paragraph', text: paragraph, children: [] }]
          : [],
      },
    ],
  };
}

describe('LlmSummaryPostProcessor', () => {
  let written: unknown[];
  let writer: ArtifactWriter;

  beforeEach(() => {
    written = [];
    writer = {
      writeDocument: jest.fn(),
      writeJson: async (dir, fileName, payload) => {
        written.push(payload);
        return `${dir}/${fileName}`;
      },
    };
  });

  it('writes one summary per page with content', async () => {
    const processor = new LlmSummaryPostProcessor(
      new FakeLLMProviderFactory([' Install the package first. ']),
      writer,
    );

    const result = await processor.process(
      [
        doc('https://example.com/a', 'Run npm install.'),
        doc('https://example.com/b', null),
      ],
      { url: 'https://example.com/', collection: 'docs', artifactDir: 'out' },
    );

    expect(result).toEqual({ artifacts: ['out/summaries.json'] });
    expect(written).toEqual([
      {
        url: 'https://example.com/',
        collection: 'docs',
        summaries: [
          {
            url: 'https://example.com/a',
            title: 'Guide',
            summary: 'Install the package first.',
          },
        ],
      },
    ]);
  });

  it('joins section headings and text into the model input', () => {
    expect(summaryInput(doc('https://example.com/a', 'Run npm install.'))).toBe(
      '## Guide > Setup\nRun npm install.',
    );
  });
});
