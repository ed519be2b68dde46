/**
 * Schema SQL loading and statement splitting.
 *
 * Handles reading schema.sql and splitting it into individual statements,
 * respecting BEGIN...END blocks (triggers).
 */

import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));

const SCHEMA_PATH = join(__dirname, 'schema.sql');

/**
 * Load and parse the schema SQL file into individual statements.
 */
export function loadSchemaStatements(schemaPath: string = SCHEMA_PATH): string[] {
  return splitStatements(readFileSync(schemaPath, 'utf-8'));
}

/**
 * Split SQL text into individual statements, respecting BEGIN...END blocks.
 *
 * Splits on semicolons at line ends; a trigger body stays one statement
 * until its `END;` line.
 */
export function splitStatements(sql: string): string[] {
  const statements: string[] = [];
  let current = '';
  let inTrigger = false;

  for (const line of sql.split('\n')) {
    const trimmed = line.trim();

    // Comment lines between statements
    if (!current && (trimmed.startsWith('--') || !trimmed)) continue;

    current += (current ? '\n' : '') + line;

    if (/\bBEGIN\s*$/i.test(trimmed)) {
      inTrigger = true;
    }

    if (inTrigger && /^END\s*;/i.test(trimmed)) {
      inTrigger = false;
      statements.push(current.trim().replace(/;$/, ''));
      current = '';
      continue;
    }

    if (!inTrigger && trimmed.endsWith(';')) {
      const stmt = current.trim().replace(/;$/, '').trim();
      if (stmt) statements.push(stmt);
      current = '';
    }
  }

  const trailing = current.trim().replace(/;$/, '').trim();
  if (trailing) statements.push(trailing);

  return statements;
}
