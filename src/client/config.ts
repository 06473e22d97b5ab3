/**
 * Block Blob Provider Configuration
 *
 * Configuration types, defaults, validation and builder for AzureBlobProvider.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import type { Logger, LogLevel } from '../observability/index.js';

/** Store service version sent with every request */
export const API_VERSION = '2023-11-03';

/** Default chunk size (256 KB) */
export const DEFAULT_CHUNK_SIZE = 256 * 1024;

/** Minimum chunk size (1 byte) */
export const MIN_CHUNK_SIZE = 1;

/** Maximum chunk size, the largest block the service accepts (4000 MB) */
export const MAX_CHUNK_SIZE = 4000 * 1024 * 1024;

/** Maximum number of committed blocks per blob */
export const MAX_BLOCK_COUNT = 50_000;

/** Default container name prefix */
export const DEFAULT_CONTAINER_PREFIX = 'snc';

/** Retry configuration (linear backoff) */
export interface RetryConfig {
  /** Maximum retries after the first attempt (default: 3) */
  maxRetries: number;
  /** Fixed delay between attempts in milliseconds (default: 1000) */
  retryIntervalMs: number;
}

/** Provider configuration */
export interface ProviderConfig {
  /** Storage connection string (alternative to accountName + credentials) */
  connectionString?: string;
  /** Storage account name */
  accountName?: string;
  /** Storage account key (base64) */
  accountKey?: string;
  /** SAS token */
  sasToken?: string;
  /** Custom blob endpoint (for emulator or private endpoints) */
  endpoint?: string;
  /** Bytes per block; every chunk written for a blob must use this size (default: 256KB) */
  chunkSize?: number;
  /** Tenant identifier appended to the container prefix (default: '') */
  tenantId?: string;
  /** Container name prefix (default: 'snc') */
  containerPrefix?: string;
  /** Request timeout in milliseconds (default: 300000 = 5 min) */
  timeout?: number;
  /** Retry configuration */
  retry?: Partial<RetryConfig>;
  /** Send Content-MD5 with every staged block (default: true) */
  transactionalMd5?: boolean;
  /** Log level for the default console logger (default: 'info') */
  logLevel?: LogLevel;
  /** Custom logger; overrides logLevel */
  logger?: Logger;
}

/** Credentials resolved from the configuration */
export type StoreCredentials =
  | { type: 'shared-key'; accountName: string; accountKey: string }
  | { type: 'sas-token'; accountName: string; sasToken: string };

/** Normalized configuration with all defaults applied */
export interface NormalizedProviderConfig {
  accountName: string;
  endpoint: string;
  credentials: StoreCredentials;
  chunkSize: number;
  tenantId: string;
  containerPrefix: string;
  timeout: number;
  retry: RetryConfig;
  transactionalMd5: boolean;
  logLevel: LogLevel;
}

/** Default configuration values */
export const DEFAULT_CONFIG = {
  chunkSize: DEFAULT_CHUNK_SIZE,
  tenantId: '',
  containerPrefix: DEFAULT_CONTAINER_PREFIX,
  timeout: 300000, // 5 minutes
  retry: {
    maxRetries: 3,
    retryIntervalMs: 1000,
  },
  transactionalMd5: true,
  logLevel: 'info' as const,
} as const;

const RetryConfigSchema = z.object({
  maxRetries: z.number().int().min(0).max(10),
  retryIntervalMs: z.number().int().min(0),
});

const ProviderConfigSchema = z.object({
  connectionString: z.string().min(1).optional(),
  accountName: z.string().min(1).optional(),
  accountKey: z.string().min(1).optional(),
  sasToken: z.string().min(1).optional(),
  endpoint: z.string().url().optional(),
  chunkSize: z
    .number()
    .int('chunkSize must be an integer')
    .min(MIN_CHUNK_SIZE, `chunkSize must be at least ${MIN_CHUNK_SIZE} byte`)
    .max(MAX_CHUNK_SIZE, `chunkSize must be at most ${MAX_CHUNK_SIZE} bytes`)
    .optional(),
  tenantId: z.string().optional(),
  containerPrefix: z.string().optional(),
  timeout: z.number().int().min(0).optional(),
  retry: RetryConfigSchema.partial().optional(),
  transactionalMd5: z.boolean().optional(),
  logLevel: z.enum(['error', 'warn', 'info', 'debug', 'trace']).optional(),
});

/** Parsed connection string parts */
export interface ConnectionStringParts {
  accountName?: string;
  accountKey?: string;
  sasToken?: string;
  blobEndpoint?: string;
  protocol: string;
  endpointSuffix: string;
}

/**
 * Parse a storage connection string (`Key=Value;Key=Value`).
 * Values may contain '=' (account keys end in base64 padding).
 */
export function parseConnectionString(connectionString: string): ConnectionStringParts {
  const parts = new Map<string, string>();

  for (const part of connectionString.split(';')) {
    const [key, ...valueParts] = part.split('=');
    if (key && valueParts.length > 0) {
      parts.set(key.trim(), valueParts.join('='));
    }
  }

  return {
    accountName: parts.get('AccountName'),
    accountKey: parts.get('AccountKey'),
    sasToken: parts.get('SharedAccessSignature'),
    blobEndpoint: parts.get('BlobEndpoint'),
    protocol: parts.get('DefaultEndpointsProtocol') ?? 'https',
    endpointSuffix: parts.get('EndpointSuffix') ?? 'core.windows.net',
  };
}

/**
 * Validate and normalize configuration with defaults
 *
 * @throws {ConfigurationError} If the configuration is invalid or has no usable credentials
 */
export function normalizeConfig(config: ProviderConfig): NormalizedProviderConfig {
  const result = ProviderConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`);
    throw new ConfigurationError({
      message: `Invalid provider configuration: ${issues.join('; ')}`,
      issues,
    });
  }

  const fromConnectionString = config.connectionString
    ? parseConnectionString(config.connectionString)
    : undefined;

  const accountName = config.accountName ?? fromConnectionString?.accountName;
  if (!accountName) {
    throw new ConfigurationError({
      message: 'Either accountName or a connection string with AccountName is required',
    });
  }

  const accountKey = config.accountKey ?? fromConnectionString?.accountKey;
  const sasToken = config.sasToken ?? fromConnectionString?.sasToken;

  let credentials: StoreCredentials;
  if (accountKey) {
    credentials = { type: 'shared-key', accountName, accountKey };
  } else if (sasToken) {
    credentials = { type: 'sas-token', accountName, sasToken };
  } else {
    throw new ConfigurationError({
      message: 'Configuration must contain either an account key or a shared access signature',
    });
  }

  let endpoint = config.endpoint ?? fromConnectionString?.blobEndpoint;
  if (!endpoint) {
    const protocol = fromConnectionString?.protocol ?? 'https';
    const suffix = fromConnectionString?.endpointSuffix ?? 'core.windows.net';
    endpoint = `${protocol}://${accountName}.blob.${suffix}`;
  }

  return {
    accountName,
    endpoint: endpoint.replace(/\/+$/, ''),
    credentials,
    chunkSize: config.chunkSize ?? DEFAULT_CONFIG.chunkSize,
    tenantId: config.tenantId ?? DEFAULT_CONFIG.tenantId,
    containerPrefix: config.containerPrefix ?? DEFAULT_CONFIG.containerPrefix,
    timeout: config.timeout ?? DEFAULT_CONFIG.timeout,
    retry: {
      ...DEFAULT_CONFIG.retry,
      ...config.retry,
    },
    transactionalMd5: config.transactionalMd5 ?? DEFAULT_CONFIG.transactionalMd5,
    logLevel: config.logLevel ?? DEFAULT_CONFIG.logLevel,
  };
}

/**
 * Configuration builder for fluent API
 */
export class ProviderConfigBuilder {
  private config: ProviderConfig = {};

  /**
   * Create builder with account name
   */
  constructor(accountName?: string) {
    if (accountName) {
      this.config.accountName = accountName;
    }
  }

  withAccountName(accountName: string): this {
    this.config.accountName = accountName;
    return this;
  }

  withConnectionString(connectionString: string): this {
    this.config.connectionString = connectionString;
    return this;
  }

  withAccountKey(accountKey: string): this {
    this.config.accountKey = accountKey;
    return this;
  }

  withSasToken(sasToken: string): this {
    this.config.sasToken = sasToken;
    return this;
  }

  /**
   * Set custom endpoint
   */
  withEndpoint(endpoint: string): this {
    this.config.endpoint = endpoint;
    return this;
  }

  /**
   * Set chunk size; must match the chunk size the application writes with
   */
  withChunkSize(sizeBytes: number): this {
    this.config.chunkSize = sizeBytes;
    return this;
  }

  withTenant(tenantId: string): this {
    this.config.tenantId = tenantId;
    return this;
  }

  withContainerPrefix(prefix: string): this {
    this.config.containerPrefix = prefix;
    return this;
  }

  withTimeout(timeoutMs: number): this {
    this.config.timeout = timeoutMs;
    return this;
  }

  withRetry(retry: Partial<RetryConfig>): this {
    this.config.retry = retry;
    return this;
  }

  withTransactionalMd5(enabled: boolean): this {
    this.config.transactionalMd5 = enabled;
    return this;
  }

  withLogger(logger: Logger): this {
    this.config.logger = logger;
    return this;
  }

  /**
   * Build configuration from environment variables
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): ProviderConfigBuilder {
    const builder = new ProviderConfigBuilder();

    const connectionString = env['AZURE_STORAGE_CONNECTION_STRING'];
    if (connectionString) {
      builder.withConnectionString(connectionString);
    }

    const accountName = env['AZURE_STORAGE_ACCOUNT'];
    const accountKey = env['AZURE_STORAGE_KEY'];
    const sasToken = env['AZURE_STORAGE_SAS_TOKEN'];
    const endpoint = env['AZURE_STORAGE_ENDPOINT'];

    if (accountName) {
      builder.withAccountName(accountName);
    }
    if (accountKey) {
      builder.withAccountKey(accountKey);
    }
    if (sasToken) {
      builder.withSasToken(sasToken);
    }
    if (endpoint) {
      builder.withEndpoint(endpoint);
    }

    const chunkSize = env['BLOB_PROVIDER_CHUNK_SIZE'];
    if (chunkSize) {
      builder.withChunkSize(Number(chunkSize));
    }

    const tenantId = env['BLOB_PROVIDER_TENANT_ID'];
    if (tenantId) {
      builder.withTenant(tenantId);
    }

    const prefix = env['BLOB_PROVIDER_CONTAINER_PREFIX'];
    if (prefix) {
      builder.withContainerPrefix(prefix);
    }

    return builder;
  }

  /**
   * Build the configuration
   */
  build(): ProviderConfig {
    return { ...this.config };
  }
}

/**
 * Create a config builder
 */
export function builder(accountName?: string): ProviderConfigBuilder {
  return new ProviderConfigBuilder(accountName);
}
