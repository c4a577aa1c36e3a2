import { promises as fs } from 'fs';
import { MdGraphError, getErrorMessage } from '../../src/runtime/utils/errors.js';

export async function readMarkdownFile(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new MdGraphError('input', `Cannot read ${filePath}: ${getErrorMessage(error)}`, { cause: error });
  }
}
