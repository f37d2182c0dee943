import { describe, it, expect } from 'vitest';

import { ContentMutator, toEmbedUrl } from '../../../src/content/content-mutator';
import { backlinkSlots, phrasesFor } from '../../../src/content/backlinks';
import { isTagBalanced } from '../../../src/content/markup-utils';
import type { MediaAsset } from '../../../src/pipeline/types';
import { silentLogger } from '../../../src/utils/logger';

function mutator(options: ConstructorParameters<typeof ContentMutator>[1] = {}): ContentMutator {
  return new ContentMutator({ logger: silentLogger }, options);
}

function image(url: string, alt: string, validated = true): MediaAsset {
  return { url, kind: 'image', validated, alt };
}

const FIVE_SECTIONS = [1, 2, 3, 4, 5].map((n) => `<h2>S${n}</h2><p>p${n}</p>`).join('');

describe('sanitize', () => {
  it('removes scripts, comments and unsafe attributes', () => {
    const html = '<p style="color:red" id="x" onclick="run()">Hi<script>alert(1)</script></p><!-- note -->';
    expect(mutator().sanitize(html)).toBe('<p>Hi</p>');
  });

  it('drops javascript: links but keeps the anchor text', () => {
    expect(mutator().sanitize('<a href="javascript:alert(1)">x</a>')).toBe('<a>x</a>');
  });

  it('keeps iframes only from trusted video hosts', () => {
    const html =
      '<iframe src="https://tracker.example.com/x"></iframe><iframe src="https://www.youtube.com/embed/abc"></iframe>';
    expect(mutator().sanitize(html)).toBe('<iframe src="https://www.youtube.com/embed/abc"></iframe>');
  });

  it('is idempotent', () => {
    const m = mutator();
    const once = m.sanitize('```html\n<!DOCTYPE html><div onload="x()"><p>A<style>p{}</style></p></div>\n```');
    expect(once).toBe('<div><p>A</p></div>');
    expect(m.sanitize(once)).toBe(once);
  });
});

describe('rebalance', () => {
  it('closes elements left open', () => {
    expect(mutator().rebalance('<p>a<b>b</p>')).toBe('<p>a<b>b</b></p>');
  });

  it('opens a self-closed div the way a parser does', () => {
    expect(mutator().rebalance('<div/><p>one</p><p>two</p>')).toBe('<div><p>one</p><p>two</p></div>');
  });

  it('wraps bare top-level text in a container', () => {
    expect(mutator().rebalance('Intro text<p>Body</p>')).toBe(
      '<div class="content-container">Intro text</div><p>Body</p>'
    );
  });
});

describe('applyHeadingHierarchy', () => {
  it('demotes h1 and removes skipped levels, keeping attributes', () => {
    expect(mutator().applyHeadingHierarchy('<h1>A</h1><h4 class="x">B</h4><h2>C</h2>')).toBe(
      '<h2>A</h2><h3 class="x">B</h3><h2>C</h2>'
    );
  });

  it('returns well-ordered headings unchanged', () => {
    const html = '<h2>A</h2><h3>B</h3><h3>C</h3><h2>D</h2>';
    expect(mutator().applyHeadingHierarchy(html)).toBe(html);
  });
});

describe('removeLeadingTitleHeading', () => {
  it('drops a first heading that repeats the title', () => {
    expect(mutator().removeLeadingTitleHeading('<h2> Pour-Over  Coffee </h2><p>x</p>', 'pour-over coffee')).toBe(
      '<p>x</p>'
    );
  });

  it('keeps a first heading with different text', () => {
    const html = '<h2>Gear</h2><p>x</p>';
    expect(mutator().removeLeadingTitleHeading(html, 'Pour-over coffee')).toBe(html);
  });
});

describe('injectMedia', () => {
  it('places the second image after the last heading when heading 12 does not exist', () => {
    const html = mutator().injectMedia(
      FIVE_SECTIONS,
      [image('https://cdn.example.com/a.jpg', 'A'), image('https://cdn.example.com/b.jpg', 'B')],
      null
    );

    expect(html).toBe(
      '<h2>S1</h2><figure class="blog-image"><img src="https://cdn.example.com/a.jpg" alt="A" loading="lazy"></figure><p>p1</p>' +
        '<h2>S2</h2><p>p2</p><h2>S3</h2><p>p3</p><h2>S4</h2><p>p4</p>' +
        '<h2>S5</h2><figure class="blog-image"><img src="https://cdn.example.com/b.jpg" alt="B" loading="lazy"></figure><p>p5</p>'
    );
    expect(isTagBalanced(html)).toBe(true);
  });

  it('prepends the first image when the document does not start with a heading', () => {
    expect(mutator().injectMedia('<p>x</p>', [image('https://cdn.example.com/a.jpg', 'A')], null)).toBe(
      '<figure class="blog-image"><img src="https://cdn.example.com/a.jpg" alt="A" loading="lazy"></figure><p>x</p>'
    );
  });

  it('embeds the video with its embed url', () => {
    const video: MediaAsset = {
      url: 'https://www.youtube.com/watch?v=abc123',
      kind: 'video',
      validated: true,
      alt: 'Demo',
    };
    expect(mutator().injectMedia('<h2>A</h2><p>x</p>', [], video)).toBe(
      '<h2>A</h2><figure class="video-container"><iframe src="https://www.youtube.com/embed/abc123" title="Demo" loading="lazy" allowfullscreen=""></iframe></figure><p>x</p>'
    );
  });

  it('skips unvalidated media', () => {
    const html = '<h2>A</h2><p>x</p>';
    expect(mutator().injectMedia(html, [image('https://cdn.example.com/a.jpg', 'A', false)], null)).toBe(html);
  });

  it('does not insert an image already present', () => {
    const html = '<h2>A</h2><p><img src="https://cdn.example.com/a.jpg"></p>';
    expect(mutator().injectMedia(html, [image('https://cdn.example.com/a.jpg', 'A')], null)).toBe(html);
  });

  it('honours a skip fallback', () => {
    const html = '<h2>A</h2><p>x</p>';
    const result = mutator().injectMedia(html, [image('https://cdn.example.com/a.jpg', 'A')], null, {
      images: [{ rule: { kind: 'after-paragraph', index: 4 }, fallback: 'skip' }],
      video: { rule: { kind: 'end' } },
    });
    expect(result).toBe(html);
  });
});

describe('applyLinkPolicy', () => {
  it('marks external links and merges rel tokens', () => {
    const html =
      '<p><a href="https://other.example.org/x" rel="author">o</a><a href="/local">l</a><a href="https://myblog.example.net/post">i</a></p>';
    expect(mutator({ siteHost: 'myblog.example.net' }).applyLinkPolicy(html)).toBe(
      '<p><a href="https://other.example.org/x" rel="author nofollow noopener noreferrer" target="_blank">o</a><a href="/local">l</a><a href="https://myblog.example.net/post">i</a></p>'
    );
  });
});

describe('insertBacklinks', () => {
  const candidates = ['https://brewguide.com/ratios', 'https://www.grindlab.org/guide', 'https://blog.brewguide.com/other'];

  it('adds reference sentences after every n-th paragraph', () => {
    const html = '<p>one</p><p>two</p><p>three</p><p>four</p>';
    expect(mutator({ backlinkParagraphInterval: 2 }).insertBacklinks(html, candidates, 'en')).toBe(
      '<p>one</p><p>two</p>' +
        '<p>For more details, see <a href="https://brewguide.com/ratios" target="_blank" rel="nofollow noopener noreferrer">brewguide.com</a>.</p>' +
        '<p>three</p><p>four</p>' +
        '<p>Further reading is available at <a href="https://www.grindlab.org/guide" target="_blank" rel="nofollow noopener noreferrer">grindlab.org</a>.</p>'
    );
  });

  it('uses the last paragraph when there are fewer than the interval', () => {
    const html = '<p>one</p><p>two</p>';
    expect(mutator({ backlinkParagraphInterval: 5 }).insertBacklinks(html, candidates, 'fr')).toBe(
      '<p>one</p><p>two</p>' +
        '<p>Pour plus de détails, consultez <a href="https://brewguide.com/ratios" target="_blank" rel="nofollow noopener noreferrer">brewguide.com</a>.</p>'
    );
  });

  it('leaves documents with enough external links alone', () => {
    const html = '<p>See <a href="https://source.example.org/a">this</a></p>';
    expect(mutator().insertBacklinks(html, candidates, 'en')).toBe(html);
  });

  it('skips candidates whose domain is already mentioned', () => {
    const html = '<p>As brewguide.com explains</p><p>two</p>';
    expect(mutator({ backlinkParagraphInterval: 1, maxBacklinks: 1 }).insertBacklinks(html, candidates, 'en')).toBe(
      '<p>As brewguide.com explains</p>' +
        '<p>For more details, see <a href="https://www.grindlab.org/guide" target="_blank" rel="nofollow noopener noreferrer">grindlab.org</a>.</p>' +
        '<p>two</p>'
    );
  });
});

describe('backlink helpers', () => {
  it('computes paragraph slots', () => {
    expect(backlinkSlots(12, 5, 3)).toEqual([4, 9]);
    expect(backlinkSlots(3, 5, 3)).toEqual([2]);
    expect(backlinkSlots(0, 5, 3)).toEqual([]);
    expect(backlinkSlots(3, 0, 2)).toEqual([0, 1]);
  });

  it('falls back to English phrases', () => {
    expect(phrasesFor('es-MX')[0]).toBe('Para más detalles, consulte');
    expect(phrasesFor('de')[0]).toBe('For more details, see');
  });
});

describe('toEmbedUrl', () => {
  it.each([
    ['https://youtu.be/abc123', 'https://www.youtube.com/embed/abc123'],
    ['https://www.youtube.com/watch?v=xyz', 'https://www.youtube.com/embed/xyz'],
    ['https://youtube.com/shorts/s1', 'https://www.youtube.com/embed/s1'],
    ['https://vimeo.com/12345', 'https://player.vimeo.com/video/12345'],
    ['https://www.youtube.com/embed/q', 'https://www.youtube.com/embed/q'],
    ['not a url', 'not a url'],
  ])('%s → %s', (input, expected) => {
    expect(toEmbedUrl(input)).toBe(expected);
  });
});

describe('mutate', () => {
  it('runs the whole chain and recounts words', () => {
    const result = mutator().mutate(
      {
        title: 'Pour-Over Guide',
        bodyHtml: '```html\n<h1>Pour-Over Guide</h1><h3>Gear</h3><p>Use a kettle.<script>x</script></p>\n```',
      },
      { images: [], video: null, backlinkCandidates: [], language: 'en' }
    );

    expect(result).toEqual({ html: '<h3>Gear</h3><p>Use a kettle.</p>', wordCount: 4 });
  });
});
