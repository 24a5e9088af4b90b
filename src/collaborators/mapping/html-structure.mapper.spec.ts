import type { CrawledPage } from '../collaborator.interfaces';
import { documentSections, HtmlStructureMapper } from './html-structure.mapper';

function page(html: string, title = 'Guide'): CrawledPage {
  return {
    url: 'https://example.com/guide',
    title,
    html,
    links: ['https://example.com/other'],
    crawledAt: '2024-01-01T00:00:00.000Z',
  };
}

describe('HtmlStructureMapper', () => {
  const mapper = new HtmlStructureMapper();

  it('builds the section hierarchy in document order', async () => {
    const document = await mapper.map(
      page(`
        <html><head><title>Guide</title><script>var x = 1;</script></head>
        <body>
          <nav><p>Menu</p></nav>
          <p>Intro   text.</p>
          <h2>Install</h2>
          <p>Run the installer.</p>
          <ul><li>Step <b>one</b></li><li>Step two</li></ul>
          <h3>Options</h3>
          <pre>
npm run build
</pre>
          <table><tr><th>Flag</th><th>Meaning</th></tr><tr><td>-v</td><td>verbose</td></tr></table>
          <h2>Usage</h2>
          <p>Call it.</p>
        </body></html>`),
    );

    expect(document.title).toBe('Guide');
    expect(document.links).toEqual(['https://example.com/other']);
    expect(document.nodes).toEqual([
      { tag: 'title', text: 'Guide', children: [] },
      { tag: 'paragraph', text: 'Intro text.', children: [] },
      {
        tag: 'section',
        text: 'Install',
        children: [
          { tag: 'paragraph', text: 'Run the installer.', children: [] },
          { tag: 'list_item', text: 'Step one', children: [] },
          { tag: 'list_item', text: 'Step two', children: [] },
          {
            tag: 'subsection',
            text: 'Options',
            children: [
              { tag: 'code', text: 'npm run build', children: [] },
              {
                tag: 'table',
                text: 'Flag | Meaning\n-v | verbose',
                children: [],
              },
            ],
          },
        ],
      },
      {
        tag: 'section',
        text: 'Usage',
        children: [{ tag: 'paragraph', text: 'Call it.', children: [] }],
      },
    ]);
  });

  it('maps an empty page to its title only', async () => {
    const document = await mapper.map(page('<html><body></body></html>'));
    expect(document.nodes).toEqual([
      { tag: 'title', text: 'Guide', children: [] },
    ]);
  });

  it('falls back to the first h1, then the URL, for the title', async () => {
    const withHeading = await mapper.map(
      page('<body><h1>Welcome</h1></body>', ''),
    );
    expect(withHeading.title).toBe('Welcome');

    const bare = await mapper.map(page('<body></body>', ''));
    expect(bare.title).toBe('https://example.com/guide');
  });
});

describe('documentSections', () => {
  it('emits heading-scoped blocks in document order', async () => {
    const document = await new HtmlStructureMapper().map(
      page(
        '<body><p>Lead.</p><h2>A</h2><p>One.</p><h3>A1</h3><li>Item</li><h2>B</h2><p>Two.</p></body>',
      ),
    );

    expect(documentSections(document)).toEqual([
      { heading: 'Guide', text: 'Lead.' },
      { heading: 'Guide > A', text: 'One.' },
      { heading: 'Guide > A > A1', text: '- Item' },
      { heading: 'Guide > B', text: 'Two.' },
    ]);
  });
});
