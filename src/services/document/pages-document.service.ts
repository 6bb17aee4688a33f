/**
 * Pages Document Service
 * Opens an iWork Pages package, exposes its paragraphs to the citation processor
 * and writes the rewritten package back out.
 *
 * A Pages package is a zip archive whose markup lives in index.xml. Tags and
 * attributes keep their namespace prefixes (sf:p, sfa:ID) as parsed by cheerio
 * in XML mode.
 */

import JSZip from 'jszip';
import * as cheerio from 'cheerio';
import * as fs from 'fs/promises';
import { isTag, type Element } from 'domhandler';
import { logger } from '../../lib/logger';
import { AppError } from '../../utils/app-error';
import { ErrorCodes } from '../../utils/error-codes';
import { citationConfig } from '../../config/citation.config';
import { citationProcessorService } from '../citation/citation-processor.service';
import type {
  CitationOptions,
  CitationProcessingResult,
  RendererConfig,
} from '../citation/citation.types';
import { createElement, createText, fullText, mergeAdjacentText, replaceNode } from '../shared/xml-tree';

export const PRIMARY_DOCUMENT = 'index.xml';

const SELECTORS = {
  paragraphs: 'sf\\:text-body sf\\:p',
  insertionPoint: 'sf\\:insertion-point',
  anonStyles: 'sf\\:anon-styles',
  characterStyle: 'sf\\:characterstyle',
};

export class InvalidPagesDocumentError extends AppError {
  constructor(message: string) {
    super(message, 400, ErrorCodes.PAGES_INVALID_DOCUMENT);
  }
}

export class PagesDocument {
  private constructor(
    private readonly zip: JSZip,
    private readonly $: cheerio.CheerioAPI,
    private readonly renderer: RendererConfig
  ) {}

  static async load(
    buffer: Buffer,
    renderer: RendererConfig = citationConfig.renderer
  ): Promise<PagesDocument> {
    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(buffer);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new InvalidPagesDocumentError(`Pages package could not be read as a zip archive: ${reason}`);
    }

    const entry = zip.file(PRIMARY_DOCUMENT);
    if (!entry) {
      throw new InvalidPagesDocumentError(`${PRIMARY_DOCUMENT} not found in Pages package`);
    }

    const xml = await entry.async('text');
    const $ = cheerio.load(xml, { xmlMode: true });

    const document = new PagesDocument(zip, $, renderer);
    document.removeInsertionPoints();
    document.ensureSuperscriptStyle();
    return document;
  }

  static async open(filePath: string, renderer?: RendererConfig): Promise<PagesDocument> {
    logger.info(`[PagesDocument] Opening ${filePath}`);
    return PagesDocument.load(await fs.readFile(filePath), renderer);
  }

  /** Paragraphs of the document body in document order */
  textBearingNodes(): Element[] {
    return this.$(SELECTORS.paragraphs).toArray().filter(isTag);
  }

  processCitations(options: CitationOptions): CitationProcessingResult {
    return citationProcessorService.processCitations(this.textBearingNodes(), options, this.renderer);
  }

  toXml(): string {
    return this.$.xml();
  }

  async toBuffer(): Promise<Buffer> {
    this.zip.file(PRIMARY_DOCUMENT, this.toXml());
    return this.zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
  }

  async materialize(outputPath: string): Promise<void> {
    await fs.writeFile(outputPath, await this.toBuffer());
    logger.info(`[PagesDocument] Wrote ${outputPath}`);
  }

  /**
   * The editor's caret marker splits a paragraph's text in two, which can cut a
   * `\cite{}` marker apart. Keep its text and drop the element.
   */
  private removeInsertionPoints(): void {
    for (const insertionPoint of this.$(SELECTORS.insertionPoint).toArray().filter(isTag)) {
      const parent = insertionPoint.parent;
      const text = fullText(insertionPoint);
      replaceNode(insertionPoint, text ? [createText(text)] : []);
      if (parent) mergeAdjacentText(parent);
    }
  }

  /** Superscript citations point at a character style that must exist in the header */
  private ensureSuperscriptStyle(): void {
    const anonStyles = this.$(SELECTORS.anonStyles).first();
    if (anonStyles.length === 0) {
      logger.warn('[PagesDocument] No sf:anon-styles section; superscript citations will be unstyled');
      return;
    }

    const styleId = this.renderer.superscriptStyleId;
    const existing = anonStyles
      .children(SELECTORS.characterStyle)
      .filter((_, style) => isTag(style) && style.attribs['sfa:ID'] === styleId);
    if (existing.length > 0) return;

    const style = createElement(
      'sf:characterstyle',
      { 'sf:parent-ident': 'character-style-null', 'sfa:ID': styleId },
      [
        createElement('sf:property-map', {}, [
          createElement('sf:superscript', {}, [
            createElement('sf:number', { 'sfa:number': '1', 'sfa:type': 'i' }),
          ]),
        ]),
      ]
    );
    anonStyles.append(style);
  }
}
