/**
 * Container and blob naming
 *
 * Container names are `<prefix><tenantId>`. Both container and blob names are
 * checked against the service's grammar before any request is sent.
 */

import { NamingError } from '../errors/index.js';

/** Minimum container name length */
export const MIN_CONTAINER_NAME_LENGTH = 3;

/** Maximum container name length */
export const MAX_CONTAINER_NAME_LENGTH = 63;

/** Maximum blob name length */
export const MAX_BLOB_NAME_LENGTH = 1024;

/** Maximum number of '/'-separated segments in a blob name */
export const MAX_BLOB_NAME_SEGMENTS = 254;

/**
 * Derive the container name for a tenant
 */
export function resolveContainerName(prefix: string, tenantId: string = ''): string {
  return `${prefix}${tenantId}`;
}

/**
 * Validate a container name
 *
 * @throws {NamingError} If the name breaks the container naming rules
 */
export function validateContainerName(name: string): void {
  const fail = (reason: string): never => {
    throw new NamingError({ reason, invalidName: name, kind: 'container', container: name });
  };

  if (name.length < MIN_CONTAINER_NAME_LENGTH || name.length > MAX_CONTAINER_NAME_LENGTH) {
    fail(`must be ${MIN_CONTAINER_NAME_LENGTH}-${MAX_CONTAINER_NAME_LENGTH} characters long`);
  }

  if (!/^[a-z0-9-]+$/.test(name)) {
    fail('can only contain lowercase letters, numbers, and hyphens');
  }

  if (name.startsWith('-') || name.endsWith('-')) {
    fail('must start and end with a letter or number');
  }

  if (name.includes('--')) {
    fail('cannot contain consecutive hyphens');
  }
}

/**
 * Resolve and validate in one step
 */
export function containerNameFor(prefix: string, tenantId: string = ''): string {
  const name = resolveContainerName(prefix, tenantId);
  validateContainerName(name);
  return name;
}

/**
 * Validate a blob name
 *
 * @throws {NamingError} If the name breaks the blob naming rules
 */
export function validateBlobName(name: string): void {
  const fail = (reason: string): never => {
    throw new NamingError({ reason, invalidName: name, kind: 'blob', blobName: name });
  };

  if (name.length === 0 || name.length > MAX_BLOB_NAME_LENGTH) {
    fail(`must be 1-${MAX_BLOB_NAME_LENGTH} characters long`);
  }

  if (name.endsWith('.') || name.endsWith('/')) {
    fail('cannot end with a dot or a forward slash');
  }

  if (name.split('/').length > MAX_BLOB_NAME_SEGMENTS) {
    fail(`cannot have more than ${MAX_BLOB_NAME_SEGMENTS} path segments`);
  }
}
