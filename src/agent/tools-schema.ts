import type { JsonSchema } from '../types.js';
import type { FieldError } from '../tools/tool-error.js';
import { UPDATE_OPERATIONS } from '../tools/file-mutations.js';

const obj = (properties: Record<string, JsonSchema>, required: string[] = []): JsonSchema => ({
  type: 'object',
  additionalProperties: false,
  properties,
  required,
});
const str = (description?: string): JsonSchema => ({ type: 'string', ...(description ? { description } : {}) });
const bool = (description?: string): JsonSchema => ({ type: 'boolean', ...(description ? { description } : {}) });
const int = (min?: number, max?: number, description?: string): JsonSchema => ({
  type: 'integer',
  ...(min !== undefined && { minimum: min }),
  ...(max !== undefined && { maximum: max }),
  ...(description ? { description } : {}),
});
const oneOf = (values: readonly string[], description?: string): JsonSchema => ({
  type: 'string',
  enum: [...values],
  ...(description ? { description } : {}),
});

export type BuiltinToolName =
  | 'read_file'
  | 'write_file'
  | 'update_file'
  | 'search_files'
  | 'list_directory'
  | 'file_info';

export const BUILTIN_TOOL_NAMES: readonly BuiltinToolName[] = [
  'read_file',
  'write_file',
  'update_file',
  'search_files',
  'list_directory',
  'file_info',
];

export const BUILTIN_TOOL_SPECS: Record<BuiltinToolName, { description: string; parameters: JsonSchema }> = {
  read_file: {
    description: 'Read a text file. Large files are truncated; binary files return a notice.',
    parameters: obj({ path: str('File path, relative to the working directory or absolute') }, ['path']),
  },
  write_file: {
    description: 'Create or overwrite a file with the given content.',
    parameters: obj(
      {
        path: str(),
        content: str('Full file content'),
        create_dirs: bool('Create missing parent directories'),
      },
      ['path', 'content']
    ),
  },
  update_file: {
    description:
      'Edit a file in place. replace swaps one exact occurrence of search; append, prepend and insert_at_line add replacement text.',
    parameters: obj(
      {
        path: str(),
        operation: oneOf(UPDATE_OPERATIONS),
        search: str('Exact text to replace; must occur exactly once'),
        replacement: str('Replacement text, or the text to add'),
        line_number: int(1, undefined, '1-based line for insert_at_line'),
      },
      ['path', 'operation']
    ),
  },
  search_files: {
    description: 'Search file contents recursively with a regular expression. Case-insensitive by default.',
    parameters: obj(
      {
        pattern: str('Regular expression; invalid expressions match literally'),
        root: str('Directory or file to search (default: working directory)'),
        file_pattern: str('Filename glob such as *.ts'),
        case_sensitive: bool(),
        max_results: int(1, 500),
      },
      ['pattern']
    ),
  },
  list_directory: {
    description: 'List directory entries as kind, size and path.',
    parameters: obj({
      path: str('Directory (default: working directory)'),
      recursive: bool(),
      show_hidden: bool(),
    }),
  },
  file_info: {
    description: 'Show type, size, timestamps and line count for a path.',
    parameters: obj({ path: str() }, ['path']),
  },
};

function typeMatches(schema: JsonSchema, v: unknown): boolean {
  switch (schema.type) {
    case 'string':
      return typeof v === 'string';
    case 'boolean':
      return typeof v === 'boolean';
    case 'integer':
      return typeof v === 'number' && Number.isInteger(v);
    case 'number':
      return typeof v === 'number' && Number.isFinite(v);
    case 'array':
      return Array.isArray(v);
    case 'object':
      return typeof v === 'object' && v !== null && !Array.isArray(v);
    default:
      return true;
  }
}

/**
 * Check required keys and primitive types of a tool-call argument object.
 * Keys the schema does not describe are ignored.
 */
export function validateArgs(schema: JsonSchema, args: Record<string, unknown>): FieldError[] {
  const errors: FieldError[] = [];
  for (const key of schema.required ?? []) {
    if (args[key] === undefined || args[key] === null) {
      errors.push({ field: key, message: `${key} is required` });
    }
  }
  for (const [key, prop] of Object.entries(schema.properties ?? {})) {
    const v = args[key];
    if (v === undefined || v === null) continue;
    if (!typeMatches(prop, v)) {
      errors.push({ field: key, message: `${key} must be ${prop.type}`, value: v });
      continue;
    }
    if (prop.enum && (typeof v !== 'string' || !prop.enum.includes(v))) {
      errors.push({ field: key, message: `${key} must be one of ${prop.enum.join(', ')}`, value: v });
    }
    if (typeof v === 'number') {
      if (prop.minimum !== undefined && v < prop.minimum) {
        errors.push({ field: key, message: `${key} must be >= ${prop.minimum}`, value: v });
      }
      if (prop.maximum !== undefined && v > prop.maximum) {
        errors.push({ field: key, message: `${key} must be <= ${prop.maximum}`, value: v });
      }
    }
  }
  return errors;
}
