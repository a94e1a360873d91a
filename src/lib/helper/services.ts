import type { z } from 'zod';

import { generateAndWriteAutomation } from '../automation/generateAutomation.js';
import { generateAndWritePackage } from '../package/generatePackage.js';
import { MissingNameError, ServiceInputError, UnknownServiceError } from '../utils/errors.js';
import { automationRequestSchema, packageOptionsSchema } from './schemas.js';
import type { FileResult, RootPaths, WriteBehavior } from './types.js';

export const SERVICE_GENERATE_AUTOMATION = 'generate_automation';
export const SERVICE_GENERATE_PACKAGE = 'generate_package';

export interface ScaffoldOperation<TSchema extends z.ZodTypeAny = z.ZodTypeAny> {
  name: string;
  schema: TSchema;
  /** Field whose absence is reported as MissingNameError. */
  nameField: string;
  /** `raw` is the caller's data as given, before validation. */
  execute(input: z.output<TSchema>, raw: unknown): FileResult[];
}

export type ServiceRegistry = Map<string, ScaffoldOperation>;

/**
 * Validated values laid out in the caller's key order; keys the schema added
 * (defaults) follow after.
 */
function inCallerOrder<T extends object>(raw: unknown, parsed: T) {
  const original = typeof raw === 'object' && raw !== null && !Array.isArray(raw) ? raw : {};
  return { ...original, ...parsed };
}

function defineOperation<TSchema extends z.ZodTypeAny>(
  operation: ScaffoldOperation<TSchema>,
): ScaffoldOperation<TSchema> {
  return operation;
}

export function createServiceRegistry(
  rootPaths: RootPaths,
  behavior: WriteBehavior = {},
): ServiceRegistry {
  const operations: ScaffoldOperation[] = [
    defineOperation({
      name: SERVICE_GENERATE_AUTOMATION,
      schema: automationRequestSchema,
      nameField: 'alias',
      execute: (input, raw) => [
        generateAndWriteAutomation(inCallerOrder(raw, input), rootPaths, behavior),
      ],
    }),
    defineOperation({
      name: SERVICE_GENERATE_PACKAGE,
      schema: packageOptionsSchema,
      nameField: 'name',
      execute: (input) => generateAndWritePackage(input, rootPaths, behavior),
    }),
  ];

  return new Map(operations.map((operation) => [operation.name, operation]));
}

export function callService(
  registry: ServiceRegistry,
  service: string,
  data: unknown,
): FileResult[] {
  const operation = registry.get(service);
  if (!operation) {
    throw new UnknownServiceError(service);
  }

  const parsed = operation.schema.safeParse(data);
  if (!parsed.success) {
    const { issues } = parsed.error;

    if (issues.some((issue) => issue.path[0] === operation.nameField)) {
      throw new MissingNameError(operation.nameField);
    }

    const details = issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ServiceInputError(
      `Invalid input for ${service}: ${details}`,
      issues[0]?.path.join('.'),
    );
  }

  return operation.execute(parsed.data, data);
}
