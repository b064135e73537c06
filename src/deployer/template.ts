import * as fs from 'fs';

/**
 * Reads a template document as UTF-8 text. The file handle is closed
 * whether or not the read succeeds.
 */
export async function readTemplate(templatePath: string): Promise<string> {
  const handle = await fs.promises.open(templatePath, 'r');
  try {
    return await handle.readFile({ encoding: 'utf8' });
  } finally {
    await handle.close();
  }
}
