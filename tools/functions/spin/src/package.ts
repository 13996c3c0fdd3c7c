import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

export interface PackageMeta {
  name?: string;
  version?: string;
}

const moduleDir = path.dirname(fileURLToPath(import.meta.url));

function stringField(value: object, key: string): string | undefined {
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'string' ? field : undefined;
}

export function readPackageMeta(candidates = [path.resolve(moduleDir, '../package.json')]): PackageMeta {
  for (const candidate of candidates) {
    if (!fs.existsSync(candidate)) {
      continue;
    }

    const parsed: unknown = JSON.parse(fs.readFileSync(candidate, 'utf8'));
    if (typeof parsed === 'object' && parsed !== null) {
      return { name: stringField(parsed, 'name'), version: stringField(parsed, 'version') };
    }
  }

  return {};
}
