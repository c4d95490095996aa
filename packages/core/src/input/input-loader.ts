/**
 * Input Loader
 *
 * Reads a JSON input file: the declarations to classify, the capabilities
 * the table oracle should report, and the raw test suites.
 *
 *   {
 *     "declarations": [{ "name": "sort", "kind": "function", "type": "[Int] -> [Int]" }],
 *     "capabilities": { "generatable": ["[Int]"], "evaluable": ["[Int]"] },
 *     "testSuites": { "suite": { "programs": ["sort"] } }
 *   }
 *
 * Sizes on a declaration are numbers for unary data and [n1, n2] pairs for
 * binary data.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import type { CapabilityTables, Declaration } from '../classification/index.js';
import { binarySize, unarySize } from '../data-size/index.js';
import type { DataSize } from '../data-size/index.js';
import { InputErrors, InputFileError, PerfscopeErrorCode } from '../errors/index.js';
import { formatIssues } from '../test-suite/raw-schema.js';

// ============================================================================
// Schema
// ============================================================================

const SizeSchema = z.union([z.number().int(), z.tuple([z.number().int(), z.number().int()])]);

const DeclarationSchema = z.object({
  name: z.string().min(1),
  kind: z.enum(['function', 'type-class', 'data-type']),
  type: z.string().optional(),
  sizes: z.array(SizeSchema).optional(),
});

const InputFileSchema = z.object({
  declarations: z.array(DeclarationSchema),
  capabilities: z
    .object({
      generatable: z.array(z.string()).default([]),
      evaluable: z.array(z.string()).default([]),
    })
    .default({}),
  testSuites: z.record(z.string(), z.unknown()).default({}),
});

export interface InputFile {
  declarations: Declaration[];
  capabilities: CapabilityTables;
  testSuites: Record<string, unknown>;
}

function toDataSize(size: z.infer<typeof SizeSchema>): DataSize {
  return typeof size === 'number' ? unarySize(size) : binarySize(size[0], size[1]);
}

// ============================================================================
// Loading
// ============================================================================

export function parseInputFile(json: string, source = '<input>'): InputFile {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    throw new InputFileError(
      InputErrors.file(`${source} is not valid JSON (${error instanceof Error ? error.message : String(error)})`),
      PerfscopeErrorCode.INVALID_FILE,
      { filePath: source }
    );
  }

  const result = InputFileSchema.safeParse(data);
  if (!result.success) {
    throw new InputFileError(
      InputErrors.file(`${source}: ${formatIssues(result.error)}`),
      PerfscopeErrorCode.INVALID_FILE,
      { filePath: source }
    );
  }

  const { declarations, capabilities, testSuites } = result.data;
  return {
    declarations: declarations.map(d => ({
      name: d.name,
      kind: d.kind,
      type: d.type,
      sizes: d.sizes?.map(toDataSize),
    })),
    capabilities,
    testSuites,
  };
}

export async function loadInputFile(filePath: string): Promise<InputFile> {
  if (path.extname(filePath) !== '.json') {
    throw new InputFileError(
      InputErrors.filePath(`${filePath} is not a .json file`),
      PerfscopeErrorCode.INVALID_FILE_PATH,
      { filePath }
    );
  }

  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    const missing = error instanceof Error && 'code' in error && error.code === 'ENOENT';
    throw new InputFileError(
      InputErrors.file(missing ? `cannot locate ${filePath}` : `cannot read ${filePath} (${String(error)})`),
      missing ? PerfscopeErrorCode.FILE_NOT_FOUND : PerfscopeErrorCode.INVALID_FILE,
      { filePath }
    );
  }

  return parseInputFile(content, filePath);
}
