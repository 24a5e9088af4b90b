import { Injectable } from '@nestjs/common';
import * as cheerio from 'cheerio';
import type {
  CrawledPage,
  HtmlMapper,
  StructuredDocument,
  StructuredNode,
  StructuredTag,
} from '../collaborator.interfaces';

const BLOCK_SELECTOR = 'h1,h2,h3,h4,h5,h6,p,li,pre,table';
const STRIPPED_SELECTOR = 'script,style,noscript,template,svg,iframe,nav,footer';
const CONTAINER_SELECTOR = 'pre,table,li';
const SUBSECTION_HEADING = /^h[3-6]$/;

function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function node(tag: StructuredTag, text: string): StructuredNode {
  return { tag, text, children: [] };
}

/**
 * Maps rendered HTML onto a shallow tag hierarchy: title, then sections (h1/h2)
 * holding subsections (h3-h6), each holding paragraphs, list items, code and
 * tables in document order.
 */
@Injectable()
export class HtmlStructureMapper implements HtmlMapper {
  async map(page: CrawledPage): Promise<StructuredDocument> {
    const $ = cheerio.load(page.html);
    $(STRIPPED_SELECTOR).remove();

    const title =
      normalizeWhitespace(page.title) ||
      normalizeWhitespace($('h1').first().text()) ||
      page.url;
    const nodes: StructuredNode[] = [node('title', title)];

    let section: StructuredNode | null = null;
    let subsection: StructuredNode | null = null;

    const append = (child: StructuredNode): void => {
      const parent = subsection ?? section;
      if (parent) {
        parent.children.push(child);
      } else {
        nodes.push(child);
      }
    };

    $.root()
      .find(BLOCK_SELECTOR)
      .each((_, element) => {
        const $element = $(element);
        if ($element.parents(CONTAINER_SELECTOR).length > 0) {
          return;
        }

        const tagName = element.tagName.toLowerCase();
        let mapped: StructuredNode | null = null;

        if (tagName === 'h1' || tagName === 'h2') {
          const text = normalizeWhitespace($element.text());
          if (text) {
            section = node('section', text);
            subsection = null;
            nodes.push(section);
          }
          return;
        }

        if (SUBSECTION_HEADING.test(tagName)) {
          const text = normalizeWhitespace($element.text());
          if (text) {
            const heading = node('subsection', text);
            append(heading);
            subsection = heading;
          }
          return;
        }

        if (tagName === 'p' || tagName === 'li') {
          const text = normalizeWhitespace($element.text());
          mapped = text
            ? node(tagName === 'p' ? 'paragraph' : 'list_item', text)
            : null;
        } else if (tagName === 'pre') {
          const text = $element.text().replace(/^\n+|\s+$/g, '');
          mapped = text ? node('code', text) : null;
        } else if (tagName === 'table') {
          const text = $element
            .find('tr')
            .map((_rowIndex, row) =>
              $(row)
                .find('th,td')
                .map((_cellIndex, cell) => normalizeWhitespace($(cell).text()))
                .get()
                .join(' | '),
            )
            .get()
            .filter((line) => line.length > 0)
            .join('\n');
          mapped = text ? node('table', text) : null;
        }

        if (mapped) {
          append(mapped);
        }
      });

    return {
      url: page.url,
      title,
      crawledAt: page.crawledAt,
      links: page.links,
      nodes,
    };
  }
}

/**
 * Flattens a document into heading-scoped text blocks for chunking. Each block
 * carries the section path it came from.
 */
export interface DocumentSection {
  heading: string;
  text: string;
}

export function documentSections(
  document: StructuredDocument,
): DocumentSection[] {
  const sections: DocumentSection[] = [];

  const collect = (nodes: StructuredNode[], path: string[]): void => {
    const position = sections.length;
    const lines: string[] = [];
    for (const child of nodes) {
      if (child.tag === 'title') {
        continue;
      }
      if (child.tag === 'section' || child.tag === 'subsection') {
        collect(child.children, [...path, child.text]);
        continue;
      }
      lines.push(child.tag === 'list_item' ? `- ${child.text}` : child.text);
    }
    if (lines.length > 0) {
      sections.splice(position, 0, {
        heading: path.join(' > '),
        text: lines.join('\n\n'),
      });
    }
  };

  collect(document.nodes, [document.title]);
  return sections;
}
