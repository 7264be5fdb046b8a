// Builds multipart/form-data bodies for Fastify's inject() in route tests.

export type FormField = [name: string, value: string];

export type FormFile = {
  content: string | Buffer;
  filename?: string;
  fieldname?: string;
};

const BOUNDARY = '----budget-lens-test-boundary';

export function multipartRequest(fields: FormField[], file?: FormFile) {
  const chunks: Buffer[] = [];
  for (const [name, value] of fields) {
    chunks.push(
      Buffer.from(
        `--${BOUNDARY}\r\nContent-Disposition: form-data; name="${name}"\r\n\r\n${value}\r\n`
      )
    );
  }
  if (file) {
    chunks.push(
      Buffer.from(
        `--${BOUNDARY}\r\nContent-Disposition: form-data; name="${file.fieldname ?? 'file'}"; ` +
          `filename="${file.filename ?? 'budget.csv'}"\r\nContent-Type: text/csv\r\n\r\n`
      ),
      typeof file.content === 'string' ? Buffer.from(file.content) : file.content,
      Buffer.from('\r\n')
    );
  }
  chunks.push(Buffer.from(`--${BOUNDARY}--\r\n`));

  return {
    payload: Buffer.concat(chunks),
    headers: { 'content-type': `multipart/form-data; boundary=${BOUNDARY}` },
  };
}
