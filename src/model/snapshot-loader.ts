import * as fs from 'fs/promises';
import { ZodError } from 'zod';
import { createComponentLogger } from '../utils/logger';
import { InMemoryTypeModel } from './in-memory-type-model';
import { ModelSnapshotSchema } from './snapshot-schema';

const logger = createComponentLogger('snapshot-loader');

export class SnapshotValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'SnapshotValidationError';
  }
}

/**
 * Validate raw snapshot data and build the in-memory type model from it.
 */
export function createTypeModelFromSnapshot(data: unknown): InMemoryTypeModel {
  const result = ModelSnapshotSchema.safeParse(data);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new SnapshotValidationError(`Invalid model snapshot: ${issues.join('; ')}`, issues);
  }

  const model = new InMemoryTypeModel(result.data);
  logger.debug('Model snapshot loaded', {
    declarations: result.data.declarations.length,
    aliases: result.data.aliases.length,
    callables: result.data.callables.length,
  });
  return model;
}

/**
 * Read a JSON model snapshot from disk.
 */
export async function loadSnapshotFile(snapshotPath: string): Promise<InMemoryTypeModel> {
  const content = await fs.readFile(snapshotPath, 'utf-8');

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new SnapshotValidationError(
      `Snapshot ${snapshotPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return createTypeModelFromSnapshot(data);
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map(issue => {
    const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${location}: ${issue.message}`;
  });
}
