import { PDFDocument, StandardFonts, rgb, type PDFFont, type PDFPage, type RGB } from 'pdf-lib';
import { formatDuration, formatTimestamp } from '@/lib/timestamps';
import type { PipelineOutcome } from '@/types/run';

export interface PdfOptions {
  includeTimestamps?: boolean;
  generatedAt?: Date;
}

const PAGE_WIDTH = 612;
const PAGE_HEIGHT = 792;
const MARGIN = 72;
const TEXT_WIDTH = PAGE_WIDTH - MARGIN * 2;

const TITLE_SIZE = 24;
const HEADING_SIZE = 16;
const BODY_SIZE = 10;

const TEXT_COLOR = rgb(0.1, 0.1, 0.1);
const HEADING_COLOR = rgb(0.2, 0.2, 0.2);
const LABEL_COLOR = rgb(0.33, 0.33, 0.33);

const numberFormat = new Intl.NumberFormat('en-US');

const TYPOGRAPHIC_REPLACEMENTS: ReadonlyArray<[RegExp, string]> = [
  [/[‘’‚′]/g, "'"],
  [/[“”„″]/g, '"'],
  [/[–—−]/g, '-'],
  [/…/g, '...'],
  [/•/g, '-'],
  [/[\t\r\n]+/g, ' ']
];

/**
 * The standard fonts only encode WinAnsi. Typographic punctuation is mapped to
 * ASCII and anything else outside Latin-1 becomes "?".
 */
export function toPdfText(text: string): string {
  let result = text.normalize('NFC');
  for (const [pattern, replacement] of TYPOGRAPHIC_REPLACEMENTS) {
    result = result.replace(pattern, replacement);
  }
  return result.replace(/[^\x20-\x7e\xa0-\xff]/g, '?');
}

/** Greedy word wrap against the font's advance widths. Words wider than a line are split. */
export function wrapText(text: string, font: PDFFont, size: number, maxWidth: number): string[] {
  const lines: string[] = [];
  let current = '';

  const fits = (candidate: string) => font.widthOfTextAtSize(candidate, size) <= maxWidth;

  for (const word of text.split(' ').filter(Boolean)) {
    const candidate = current ? `${current} ${word}` : word;
    if (fits(candidate)) {
      current = candidate;
      continue;
    }

    if (current) {
      lines.push(current);
      current = '';
    }

    let rest = word;
    while (!fits(rest)) {
      let cut = rest.length - 1;
      while (cut > 1 && !fits(rest.slice(0, cut))) {
        cut -= 1;
      }
      lines.push(rest.slice(0, cut));
      rest = rest.slice(cut);
    }
    current = rest;
  }

  if (current) {
    lines.push(current);
  }
  return lines;
}

class PdfWriter {
  private page: PDFPage;
  private y: number;

  constructor(
    private readonly doc: PDFDocument,
    private readonly regular: PDFFont,
    private readonly bold: PDFFont
  ) {
    this.page = doc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
    this.y = PAGE_HEIGHT - MARGIN;
  }

  newPage(): void {
    this.page = this.doc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
    this.y = PAGE_HEIGHT - MARGIN;
  }

  space(points: number): void {
    this.y -= points;
  }

  private line(text: string, opts: { font: PDFFont; size: number; color: RGB; x?: number }): void {
    const lineHeight = opts.size * 1.3;
    if (this.y - lineHeight < MARGIN) {
      this.newPage();
    }
    this.y -= lineHeight;
    this.page.drawText(text, { x: opts.x ?? MARGIN, y: this.y, size: opts.size, font: opts.font, color: opts.color });
  }

  title(text: string): void {
    for (const line of wrapText(toPdfText(text), this.bold, TITLE_SIZE, TEXT_WIDTH)) {
      this.line(line, { font: this.bold, size: TITLE_SIZE, color: TEXT_COLOR });
    }
    this.space(18);
  }

  heading(text: string): void {
    this.space(8);
    this.line(toPdfText(text), { font: this.bold, size: HEADING_SIZE, color: HEADING_COLOR });
    this.space(6);
  }

  paragraph(text: string, spacing = 6): void {
    for (const line of wrapText(toPdfText(text), this.regular, BODY_SIZE, TEXT_WIDTH)) {
      this.line(line, { font: this.regular, size: BODY_SIZE, color: TEXT_COLOR });
    }
    this.space(spacing);
  }

  /** Label in bold on the left, value wrapped in the remaining width. */
  field(label: string, value: string): void {
    const labelWidth = 108;
    const lines = wrapText(toPdfText(value), this.regular, BODY_SIZE, TEXT_WIDTH - labelWidth);
    lines.forEach((line, index) => {
      if (index === 0) {
        this.line(toPdfText(label), { font: this.bold, size: BODY_SIZE, color: LABEL_COLOR });
        this.page.drawText(line, {
          x: MARGIN + labelWidth,
          y: this.y,
          size: BODY_SIZE,
          font: this.regular,
          color: TEXT_COLOR
        });
      } else {
        this.line(line, { font: this.regular, size: BODY_SIZE, color: TEXT_COLOR, x: MARGIN + labelWidth });
      }
    });
    this.space(4);
  }
}

/** Renders an outcome as a PDF study note: information, statistics, summary, then the transcript on a new page. */
export async function renderPdf(outcome: PipelineOutcome, options: PdfOptions = {}): Promise<Uint8Array> {
  const transcript = outcome.transcript;
  if (!transcript) {
    throw new Error(`Outcome for ${outcome.videoRef.videoId} has no transcript to export.`);
  }

  const includeTimestamps = options.includeTimestamps ?? true;
  const generatedAt = options.generatedAt ?? new Date();
  const { metadata } = transcript;

  const doc = await PDFDocument.create();
  doc.setTitle(toPdfText(metadata.title));
  doc.setAuthor(toPdfText(metadata.channel));
  doc.setCreationDate(generatedAt);
  doc.setModificationDate(generatedAt);

  const regular = await doc.embedFont(StandardFonts.Helvetica);
  const bold = await doc.embedFont(StandardFonts.HelveticaBold);
  const writer = new PdfWriter(doc, regular, bold);

  writer.title(metadata.title);
  writer.field('Channel:', metadata.channel || 'Unknown');
  writer.field('Upload Date:', metadata.publishedAt ?? 'Unknown');
  writer.field('Duration:', formatDuration(metadata.duration));
  writer.field('Views:', numberFormat.format(metadata.viewCount));
  writer.field('URL:', metadata.url);

  const statistics = outcome.processedText?.statistics;
  if (statistics) {
    writer.heading('Statistics');
    writer.field('Word Count:', numberFormat.format(statistics.wordCount));
    writer.field('Reading Time:', `${statistics.readingTimeMinutes.average} minutes (average)`);
    writer.field('Sentences:', numberFormat.format(statistics.sentenceCount));
  }

  const summary = outcome.summary;
  if (summary?.summary) {
    writer.heading('Summary');
    for (const block of summary.summary.split(/\n+/)) {
      writer.paragraph(block);
    }
    if (summary.keyPoints.length > 0) {
      writer.heading('Key Points');
      for (const point of summary.keyPoints) {
        writer.paragraph(`- ${point}`, 4);
      }
    }
  }

  writer.newPage();
  writer.heading('Transcript');
  for (const segment of transcript.segments) {
    const text = segment.text.trim();
    writer.paragraph(includeTimestamps ? `[${formatTimestamp(segment.start)}] ${text}` : text, 4);
  }

  return doc.save();
}
