import type { FastifyRequest } from 'fastify';
import type { SettingsInput } from './dashboard.js';
import { MissingUploadError } from './errors.js';

export type UploadForm = {
  file: Buffer;
  filename?: string;
  fields: Map<string, string[]>;
};

/** Buffers the first part named `file` and collects every text field (repeats kept in order). */
export async function readUpload(req: FastifyRequest): Promise<UploadForm> {
  const fields = new Map<string, string[]>();
  let file: Buffer | undefined;
  let filename: string | undefined;

  for await (const part of req.parts()) {
    if (part.type === 'file') {
      // other file parts still have to be drained for the iterator to advance
      const buffer = await part.toBuffer();
      if (part.fieldname === 'file' && file === undefined) {
        file = buffer;
        filename = part.filename;
      }
    } else {
      const values = fields.get(part.fieldname) ?? [];
      values.push(String(part.value ?? ''));
      fields.set(part.fieldname, values);
    }
  }

  if (file === undefined) throw new MissingUploadError();
  return { file, filename, fields };
}

function single(fields: Map<string, string[]>, key: string): string | undefined {
  const value = fields.get(key)?.[0];
  return value ? value : undefined;
}

export function settingsFromFields(fields: Map<string, string[]>): SettingsInput {
  const range = fields.get('dateRange');
  const categories = fields.get('categories');
  return {
    dateColumn: single(fields, 'dateColumn'),
    amountColumn: single(fields, 'amountColumn'),
    categoryColumn: single(fields, 'categoryColumn'),
    // one comma-separated value or one field per endpoint
    dateRange: range?.flatMap(v => v.split(',')).map(v => v.trim()).filter(Boolean),
    categories: categories?.filter(c => c !== ''),
  };
}
