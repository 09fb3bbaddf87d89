/**
 * Resolution of worker type references.
 *
 * A reference names a module and an export: `./workers/feed.js#FeedWorker`.
 * Without `#Export` the module's default export is used. Relative paths
 * resolve against the current working directory; anything else is handed to
 * the module loader as a package specifier.
 */

import path from 'path';
import { BaseWorker, type WorkerType } from './base-worker.js';

export interface ParsedTypeReference {
  modulePath: string;
  exportName: string;
}

export function parseTypeReference(reference: string): ParsedTypeReference {
  const trimmed = reference.trim();
  if (!trimmed) {
    throw new Error('Worker type reference is empty');
  }

  const hashIndex = trimmed.lastIndexOf('#');
  const modulePath = hashIndex === -1 ? trimmed : trimmed.slice(0, hashIndex);
  const exportName = hashIndex === -1 ? 'default' : trimmed.slice(hashIndex + 1);

  if (!modulePath) {
    throw new Error(`Worker type reference has no module path: ${reference}`);
  }
  if (!exportName) {
    throw new Error(`Worker type reference has an empty export name: ${reference}`);
  }
  return { modulePath, exportName };
}

/**
 * Absolute path for relative or absolute references; package specifiers are
 * returned unchanged.
 */
export function toModuleSpecifier(modulePath: string, cwd: string = process.cwd()): string {
  if (modulePath.startsWith('.') || path.isAbsolute(modulePath)) {
    return path.resolve(cwd, modulePath);
  }
  return modulePath;
}

/**
 * Checks that `value` is a concrete worker class: a subclass of BaseWorker
 * (not BaseWorker itself) that implements getWorkerId() and doWork().
 */
export function isWorkerType(value: unknown): value is WorkerType {
  if (typeof value !== 'function' || value === BaseWorker) {
    return false;
  }
  const prototype: unknown = value.prototype;
  if (!(prototype instanceof BaseWorker)) {
    return false;
  }
  return typeof prototype.getWorkerId === 'function' && typeof prototype.doWork === 'function';
}

/**
 * Imports the module behind a reference and returns the named export.
 *
 * @throws Error if the module cannot be loaded, the export is missing, or it
 * is not a concrete worker class
 */
export async function resolveWorkerType(reference: string, cwd?: string): Promise<WorkerType> {
  const { modulePath, exportName } = parseTypeReference(reference);
  const specifier = toModuleSpecifier(modulePath, cwd);

  const loaded: Record<string, unknown> = await import(specifier);

  if (!(exportName in loaded)) {
    throw new Error(`Module ${modulePath} has no export named ${exportName}`);
  }
  const candidate = loaded[exportName];
  if (!isWorkerType(candidate)) {
    throw new Error(
      `${exportName} in ${modulePath} is not a worker class (it must extend BaseWorker and implement getWorkerId() and doWork())`
    );
  }
  return candidate;
}
