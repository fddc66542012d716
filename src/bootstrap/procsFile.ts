import { promises as fs } from 'node:fs';
import path from 'node:path';
import { parseDocument } from 'yaml';
import { z, ZodError } from 'zod';
import {
  ConfigFileNotFoundError,
  ConfigParseError,
  ConfigValidationError,
  extractIssuesFromZodError
} from '../errors.js';
import { TASK_STATUSES } from '../inspection/types.js';

const trimmedString = z.string().trim().min(1, 'value cannot be empty');

const queuesSchema = z
  .union([trimmedString, z.array(trimmedString).nonempty('at least one queue is required')])
  .default(['celery'])
  .transform((queues) => (typeof queues === 'string' ? [queues] : [...queues]));

const procDefinitionSchema = z
  .object({
    name: trimmedString,
    queues: queuesSchema,
    inspectStatuses: z
      .array(z.enum(TASK_STATUSES))
      .default([])
      .transform((statuses) => [...new Set(statuses)]),
    brokerUrl: trimmedString.url('brokerUrl must be a URL').optional()
  })
  .strict();

export const procsFileSchema = z
  .object({
    procs: z.array(procDefinitionSchema)
  })
  .strict()
  .superRefine((file, ctx) => {
    const seen = new Set<string>();
    file.procs.forEach((proc, index) => {
      if (seen.has(proc.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate proc name ${proc.name}`,
          path: ['procs', index, 'name']
        });
      }
      seen.add(proc.name);
    });
  });

export type ProcsFile = z.infer<typeof procsFileSchema>;
export type ProcDefinition = ProcsFile['procs'][number];

export interface LoadProcsOptions {
  rootDir?: string;
}

const readYamlFile = async (absolutePath: string): Promise<unknown> => {
  let content: string;
  try {
    content = await fs.readFile(absolutePath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigFileNotFoundError(absolutePath, { cause: error });
    }
    throw new ConfigParseError(`Failed to read procs file: ${absolutePath}`, {
      cause: error,
      metadata: { path: absolutePath }
    });
  }

  const document = parseDocument(content);
  if (document.errors.length > 0) {
    const [error] = document.errors;
    throw new ConfigParseError(`Failed to parse procs file: ${absolutePath}`, {
      cause: error,
      metadata: { path: absolutePath }
    });
  }

  return document.toJSON();
};

export const parseProcsFile = (value: unknown): ProcsFile => {
  try {
    return procsFileSchema.parse(value);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigValidationError(extractIssuesFromZodError(error), { cause: error });
    }
    throw error;
  }
};

export const loadProcDefinitions = async (
  procsPath: string,
  options: LoadProcsOptions = {}
): Promise<ProcDefinition[]> => {
  const rootDir = options.rootDir ?? process.cwd();
  const absolutePath = path.isAbsolute(procsPath) ? procsPath : path.join(rootDir, procsPath);
  const payload = await readYamlFile(absolutePath);
  return parseProcsFile(payload).procs;
};
