import * as fs from 'fs';

export function parseRequirements(raw: string): string[] {
  const packages: string[] = [];
  for (const rawLine of raw.split(/\r?\n/)) {
    const line = rawLine.split('#')[0].trim();
    if (line) packages.push(line);
  }
  return packages;
}

export function loadRequirements(filePath: string): string[] {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Requirements file not found: ${filePath}`);
  }
  try {
    return parseRequirements(fs.readFileSync(filePath, 'utf8'));
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new Error(`Error reading requirements file: ${msg}`);
  }
}
