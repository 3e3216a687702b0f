import { promises as fs } from 'fs';
import JSZip from 'jszip';
import { basename, dirname, extname, join, resolve, sep } from 'path';
import { ValidationError } from './errors';
import { componentLogger } from './logger';

export interface ExtractOptions {
  /** Remove the zip file once it has been extracted. Default true. */
  delete?: boolean;
}

/**
 * Extract a zipped product next to the zip file.
 * @returns the product directory, named after the zip file without its extension
 */
export async function extractZippedProduct(zipFile: string, options: ExtractOptions = {}): Promise<string> {
  const { delete: deleteZip = true } = options;
  const parent = resolve(dirname(zipFile));
  const zip = await JSZip.loadAsync(await fs.readFile(zipFile));

  const entries = Object.values(zip.files).map(entry => ({ entry, target: resolve(parent, entry.name) }));
  for (const { entry, target } of entries) {
    if (target !== parent && !target.startsWith(parent + sep)) {
      throw new ValidationError(`Refusing to extract ${entry.name} outside ${parent}`);
    }
  }

  for (const { entry, target } of entries) {
    if (entry.dir) {
      await fs.mkdir(target, { recursive: true });
      continue;
    }
    await fs.mkdir(dirname(target), { recursive: true });
    await fs.writeFile(target, await entry.async('nodebuffer'));
  }

  if (deleteZip) {
    await fs.unlink(zipFile);
  }

  componentLogger('extract').info({ zip_file: zipFile, files: entries.length }, 'extracted product');
  return join(dirname(zipFile), basename(zipFile, extname(zipFile)));
}
