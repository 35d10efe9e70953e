/**
 * @arch fmtkit.infra.fs
 *
 * YAML loading for configuration and formatter option files.
 */
import { parseDocument, type YAMLError } from 'yaml';
import { z } from 'zod';
import { SystemError, ErrorCodes } from './errors.js';
import { readFile } from './file-system.js';

function describeYamlError(error: YAMLError): string {
  const position = error.linePos?.[0];
  const message = error.message.split('\n')[0];
  return position ? `line ${position.line}, column ${position.col}: ${message}` : message;
}

/**
 * Parse YAML content into an untyped value.
 * An empty document yields null.
 */
export function parseYaml(content: string): unknown {
  const doc = parseDocument(content, { prettyErrors: true });
  if (doc.errors.length > 0) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Failed to parse YAML: ${describeYamlError(doc.errors[0])}`,
      { errors: doc.errors.map(describeYamlError) }
    );
  }
  const value: unknown = doc.toJS();
  return value;
}

/**
 * Parse and validate YAML content with a Zod schema.
 */
export function parseYamlWithSchema<T extends z.ZodType>(
  content: string,
  schema: T
): z.infer<T> {
  const result = schema.safeParse(parseYaml(content));

  if (!result.success) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `YAML validation failed: ${formatZodError(result.error)}`,
      { errors: result.error.issues }
    );
  }

  return result.data;
}

/**
 * Load and validate a YAML file with a Zod schema.
 * Errors name the file they came from.
 */
export async function loadYamlWithSchema<T extends z.ZodType>(
  filePath: string,
  schema: T
): Promise<z.infer<T>> {
  let content: string;
  try {
    content = await readFile(filePath);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.READ_FAILED,
      `Failed to read YAML file: ${filePath}`,
      { filePath, error }
    );
  }

  try {
    return parseYamlWithSchema(content, schema);
  } catch (error) {
    if (!(error instanceof SystemError)) throw error;
    throw new SystemError(error.code, `${error.message} (file: ${filePath})`, { ...error.details, filePath });
  }
}

/**
 * Format Zod issues as `path: message` pairs.
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.map(String).join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}
