import { readFile, writeFile } from 'fs/promises';

export const PROCESSING_SECTION_HEADER = '# Processing Configuration';

function keyOf(line: string): string | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith('#') || !trimmed.includes('=')) {
    return null;
  }
  return trimmed.split('=')[0].trim();
}

async function readLines(filePath: string): Promise<string[]> {
  try {
    const content = await readFile(filePath, 'utf-8');
    const lines = content.length > 0 ? content.split('\n') : [];
    if (lines.length > 0 && lines[lines.length - 1] === '') {
      lines.pop();
    }
    return lines;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }
}

/**
 * Writes KEY=value pairs into a dotenv file. Existing keys are replaced in
 * place; new keys go under the processing section header, which is appended
 * when the file has none. Comments and blank lines are left untouched.
 */
export async function upsertEnvValues(filePath: string, values: Record<string, string>): Promise<void> {
  const lines = await readLines(filePath);

  for (const [key, value] of Object.entries(values)) {
    const entry = `${key}=${value}`;
    const existing = lines.findIndex(line => keyOf(line) === key);
    if (existing >= 0) {
      lines[existing] = entry;
      continue;
    }

    const header = lines.findIndex(line => line.includes(PROCESSING_SECTION_HEADER));
    if (header >= 0) {
      lines.splice(header + 1, 0, entry);
    } else {
      if (lines.length > 0) {
        lines.push('');
      }
      lines.push(PROCESSING_SECTION_HEADER, entry);
    }
  }

  await writeFile(filePath, `${lines.join('\n')}\n`, 'utf-8');
}
