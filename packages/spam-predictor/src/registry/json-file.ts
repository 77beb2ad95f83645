import fs from 'node:fs';

import { ConfigError, getErrorMessage } from '@spamcheck/core';
import { err, ok, type Result } from 'neverthrow';
import type { ZodError } from 'zod';

export function readJsonFile(filePath: string): Result<unknown, ConfigError> {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    return err(new ConfigError(`Failed to read ${filePath}: ${getErrorMessage(error)}`));
  }

  try {
    const parsed: unknown = JSON.parse(content);
    return ok(parsed);
  } catch (error) {
    return err(new ConfigError(`Failed to parse ${filePath}: ${getErrorMessage(error)}`));
  }
}

export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}
