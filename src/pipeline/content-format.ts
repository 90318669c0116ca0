import type { MediaImage, MediaReference } from '../storage/models.js';

interface Insertion {
  offset: number;
  html: string;
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function imageFigure(image: MediaImage): string {
  const caption = image.credit
    ? `<figcaption>Photo: ${escapeHtml(image.credit)}</figcaption>`
    : '';
  return `<figure class="wp-block-image size-large"><img src="${escapeHtml(image.url)}" alt="${escapeHtml(image.alt ?? '')}" />${caption}</figure>`;
}

/**
 * Offsets just past each paragraph end. A break at the very end does not
 * split anything and is left out.
 */
function paragraphEnds(body: string): number[] {
  const ends: number[] = [];
  for (const match of body.matchAll(/<\/p>|\n\s*\n/g)) {
    ends.push((match.index ?? 0) + match[0].length);
  }
  return ends.filter(end => end < body.length);
}

function nearest(ends: number[], target: number): number {
  return ends.reduce((best, end) =>
    Math.abs(end - target) < Math.abs(best - target) ? end : best
  );
}

/**
 * Post HTML: featured image figure on top, inline images spread evenly
 * through the article, and the video embed after the paragraph nearest the
 * middle (or at the end for single-paragraph bodies). An inline image with no
 * paragraph break after its share of the article is left out.
 */
export function formatPostContent(body: string, media: MediaReference | null): string {
  const ends = paragraphEnds(body);
  const insertions: Insertion[] = [];

  if (media?.videoRef) {
    insertions.push({
      offset: ends.length > 0 ? nearest(ends, body.length / 2) : body.length,
      html: `\n[embed]${media.videoRef}[/embed]\n`
    });
  }

  const inline = media?.inlineImages ?? [];
  inline.forEach((image, index) => {
    const target = (body.length / (inline.length + 1)) * (index + 1);
    const offset = ends.find(end => end >= target);
    if (offset !== undefined) {
      insertions.push({ offset, html: `\n${imageFigure(image)}\n` });
    }
  });

  let content = '';
  let cursor = 0;
  for (const { offset, html } of [...insertions].sort((a, b) => a.offset - b.offset)) {
    content += `${body.slice(cursor, offset)}${html}`;
    cursor = offset;
  }
  content += body.slice(cursor);

  if (media?.imageUrl) {
    const featured = imageFigure({ url: media.imageUrl, alt: media.imageAlt, credit: media.imageCredit });
    content = `${featured}\n\n${content}`;
  }

  return content;
}
