import path from 'path';
import { ApplicationRequest, FieldValues, ResumeExtraction } from '../types';
import { logger } from '../utils/logger';
import { describeError } from '../utils/result';

export interface ResumeFile {
  name: string;
  mimeType: string;
  buffer: Buffer;
}

export interface ResumeDocument {
  extraction: ResumeExtraction;
  file: ResumeFile | null;
}

export interface DocumentExtractor {
  extract(request: ApplicationRequest): Promise<ResumeDocument>;
}

const EMPTY: ResumeExtraction = { fields: {}, text: '' };

const EMAIL = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/;
const PHONE = /(?:\+\d{1,3}[\s.-]?)?(?:\(\d{2,4}\)[\s.-]?)?\d{3,4}[\s.-]\d{3,4}(?:[\s.-]\d{2,4})?/;
const LINKEDIN = /(?:https?:\/\/)?(?:[a-z]{2,3}\.)?linkedin\.com\/in\/[A-Za-z0-9_-]+\/?/i;
const NAME_LINE = /^[A-Z][A-Za-z'’-]+(?:\s+[A-Z][A-Za-z'’.-]+){1,3}$/;

/**
 * Regex inference of contact fields from résumé text.
 */
export function inferFields(text: string): FieldValues {
  const fields: FieldValues = {};

  const email = text.match(EMAIL);
  if (email) fields.email = email[0];

  const phone = text.match(PHONE);
  if (phone) fields.phone = phone[0].trim();

  const linkedin = text.match(LINKEDIN);
  if (linkedin) {
    fields.linkedinUrl = linkedin[0].startsWith('http') ? linkedin[0] : `https://${linkedin[0]}`;
  }

  const nameLine = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean)
    .slice(0, 5)
    .find((line) => NAME_LINE.test(line));
  if (nameLine) {
    const parts = nameLine.split(/\s+/);
    fields.fullName = nameLine;
    fields.firstName = parts[0];
    fields.lastName = parts[parts.length - 1];
  }

  return fields;
}

function isPdf(file: ResumeFile): boolean {
  return file.mimeType === 'application/pdf' || file.buffer.subarray(0, 4).toString('latin1') === '%PDF';
}

async function pdfText(buffer: Buffer): Promise<string> {
  // the package entry point reads a bundled sample file when it is not loaded through require
  const pdf = (await import('pdf-parse/lib/pdf-parse.js')).default;
  const result = await pdf(buffer);
  return result.text;
}

/**
 * Loads the résumé from a URL or inline base64 and extracts its text.
 * Never throws: a missing or unreadable document yields empty fields.
 */
export class ResumeExtractor implements DocumentExtractor {
  async extract(request: ApplicationRequest): Promise<ResumeDocument> {
    let file: ResumeFile | null = null;
    try {
      file = await this.load(request);
      if (!file) {
        return { extraction: EMPTY, file: null };
      }

      const text = (isPdf(file) ? await pdfText(file.buffer) : file.buffer.toString('utf-8')).trim();
      logger.debug(`Résumé ${file.name}: ${text.length} characters extracted`);
      return { extraction: { fields: inferFields(text), text }, file };
    } catch (error) {
      logger.warn(`Résumé extraction failed: ${describeError(error)}`);
      return { extraction: EMPTY, file };
    }
  }

  async load(request: ApplicationRequest): Promise<ResumeFile | null> {
    if (request.resumeBase64) {
      const payload = request.resumeBase64.replace(/^data:[^;]+;base64,/, '');
      const buffer = Buffer.from(payload, 'base64');
      const name = request.resumeFileName || 'resume.pdf';
      return { name, mimeType: mimeTypeFor(name), buffer };
    }

    if (request.resumeUrl) {
      const response = await fetch(request.resumeUrl);
      if (!response.ok) {
        throw new Error(`Résumé download failed: HTTP ${response.status}`);
      }
      const buffer = Buffer.from(await response.arrayBuffer());
      const fromUrl = path.basename(new URL(request.resumeUrl).pathname);
      const name = request.resumeFileName || (path.extname(fromUrl) ? fromUrl : 'resume.pdf');
      const header = response.headers.get('content-type');
      return { name, mimeType: header?.split(';')[0].trim() || mimeTypeFor(name), buffer };
    }

    return null;
  }
}

export function mimeTypeFor(fileName: string): string {
  switch (path.extname(fileName).toLowerCase()) {
    case '.pdf':
      return 'application/pdf';
    case '.doc':
      return 'application/msword';
    case '.docx':
      return 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';
    case '.md':
      return 'text/markdown';
    default:
      return 'text/plain';
  }
}
