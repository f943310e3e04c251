import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { TextDecoder } from 'node:util';
import { UnsupportedFormatError, ValidationError, getErrorMessage } from '../errors';
import { logger } from '../utils/logger';

export const SUPPORTED_EXTENSIONS = ['.pdf', '.docx', '.doc', '.txt'] as const;
export const DEFAULT_MAX_FILE_BYTES = 10 * 1024 * 1024;

export interface FileMetadata {
  file_size: number;
  file_extension: string;
  processed_at: string;
}

export interface LoadedFile {
  filename: string;
  text: string;
  metadata: FileMetadata;
}

export function fileExtension(filename: string): string {
  return path.extname(filename).toLowerCase();
}

export function isSupportedFile(filename: string): boolean {
  return (SUPPORTED_EXTENSIONS as readonly string[]).includes(fileExtension(filename));
}

export function validateFile(content: Buffer, filename: string, maxBytes = DEFAULT_MAX_FILE_BYTES): void {
  if (content.length > maxBytes) {
    throw new ValidationError(`File too large: ${content.length} bytes (max: ${maxBytes})`);
  }
  if (!isSupportedFile(filename)) {
    throw new UnsupportedFormatError(fileExtension(filename));
  }
  if (content.length === 0) {
    throw new ValidationError('File is empty');
  }
}

export function sanitizeText(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '') // Control characters, keeping \t and \n
    .replace(/\uFFFD/g, '') // Replacement characters
    .trim();
}

export function decodeText(content: Buffer): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(content);
  } catch {
    logger.warning('⚠️  Text is not valid UTF-8, decoding as latin1');
    return content.toString('latin1');
  }
}

async function extractPdf(content: Buffer): Promise<string> {
  // Loaded on demand so plain-text ingestion never pays for the PDF parser.
  const { default: pdf } = await import('pdf-parse');
  const data = await pdf(content);
  return data.text;
}

async function extractWord(content: Buffer): Promise<string> {
  const mammoth = await import('mammoth');
  const result = await mammoth.extractRawText({ buffer: content });
  return result.value;
}

export async function extractText(content: Buffer, filename: string): Promise<string> {
  const extension = fileExtension(filename);
  let raw: string;

  try {
    switch (extension) {
      case '.pdf':
        raw = await extractPdf(content);
        break;
      case '.docx':
      case '.doc':
        raw = await extractWord(content);
        break;
      case '.txt':
        raw = decodeText(content);
        break;
      default:
        throw new UnsupportedFormatError(extension);
    }
  } catch (error) {
    if (error instanceof UnsupportedFormatError) throw error;
    throw new ValidationError(`Failed to extract text from ${path.basename(filename)}: ${getErrorMessage(error)}`, error);
  }

  const text = sanitizeText(raw);
  logger.debug(`📝 Extracted ${text.length} characters from ${path.basename(filename)}`);
  return text;
}

/**
 * Validate and extract a file from disk. The document is keyed by its base name.
 */
export async function loadFile(filePath: string, maxBytes = DEFAULT_MAX_FILE_BYTES): Promise<LoadedFile> {
  const filename = path.basename(filePath);
  const content = await fs.readFile(filePath);
  validateFile(content, filename, maxBytes);

  const text = await extractText(content, filename);
  if (!text) {
    throw new ValidationError(`No text extracted from: ${filename}`);
  }

  return {
    filename,
    text,
    metadata: {
      file_size: content.length,
      file_extension: fileExtension(filename),
      processed_at: new Date().toISOString(),
    },
  };
}
