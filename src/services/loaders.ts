import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { PDFParse } from 'pdf-parse';
import type { DocumentSource } from '../types/index';
import { IngestionError, errorMessage } from '../utils/errors';
import { cleanExtractedText, stripHtml } from '../utils/text';

export const TEXT_FILE_EXTENSIONS = new Set(['.txt', '.md', '.markdown', '.csv', '.json', '.log']);
export const HTML_FILE_EXTENSIONS = new Set(['.html', '.htm']);
export const PDF_FILE_EXTENSIONS = new Set(['.pdf']);

export function isSupportedFile(path: string): boolean {
  const ext = extname(path).toLowerCase();
  return TEXT_FILE_EXTENSIONS.has(ext) || HTML_FILE_EXTENSIONS.has(ext) || PDF_FILE_EXTENSIONS.has(ext);
}

/** Filename, URL or given name the document is known by */
export function sourceName(source: DocumentSource): string {
  switch (source.kind) {
    case 'text':
      return source.name;
    case 'file':
      return source.path;
    case 'url':
      return source.url;
  }
}

export async function extractTextFromPDF(data: Uint8Array): Promise<string> {
  const parser = new PDFParse({ data });
  try {
    const result = await parser.getText();
    return cleanExtractedText(result.text);
  } finally {
    await parser.destroy();
  }
}

export async function extractTextFromFile(filePath: string): Promise<string> {
  const ext = extname(filePath).toLowerCase();
  if (!isSupportedFile(filePath)) {
    throw new IngestionError(`Unsupported file type "${ext || '(none)'}": ${filePath}`);
  }

  let buffer: Buffer;
  try {
    buffer = await readFile(filePath);
  } catch (err) {
    throw new IngestionError(`Cannot read ${filePath}: ${errorMessage(err)}`, err);
  }

  if (PDF_FILE_EXTENSIONS.has(ext)) {
    return extractTextFromPDF(new Uint8Array(buffer));
  }
  if (HTML_FILE_EXTENSIONS.has(ext)) {
    return stripHtml(buffer.toString('utf8'));
  }
  return cleanExtractedText(buffer.toString('utf8'));
}

export async function extractTextFromUrl(url: string): Promise<string> {
  let response: Response;
  try {
    response = await fetch(url);
  } catch (err) {
    throw new IngestionError(`Failed to fetch ${url}: ${errorMessage(err)}`, err);
  }

  if (!response.ok) {
    throw new IngestionError(`Failed to fetch ${url}: HTTP ${response.status}`);
  }

  const contentType = response.headers.get('content-type') ?? '';
  if (contentType.includes('application/pdf')) {
    return extractTextFromPDF(new Uint8Array(await response.arrayBuffer()));
  }

  const body = await response.text();
  return contentType.includes('html') ? stripHtml(body) : cleanExtractedText(body);
}

/**
 * Produce the raw text handed to the chunker. Inline text is used as given so
 * chunk offsets refer to exactly what the caller supplied.
 */
export async function loadDocumentText(source: DocumentSource): Promise<string> {
  switch (source.kind) {
    case 'text':
      return source.text;
    case 'file':
      return extractTextFromFile(source.path);
    case 'url':
      return extractTextFromUrl(source.url);
  }
}
