import { Logger } from '@aws-lambda-powertools/logger';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';

type LogLevel = NonNullable<NonNullable<ConstructorParameters<typeof Logger>[0]>['logLevel']>;

const childLoggers: Logger[] = [];

const __dirname = path.dirname(fileURLToPath(import.meta.url));

const LOG_LEVELS: readonly LogLevel[] = ['DEBUG', 'INFO', 'WARN', 'ERROR', 'SILENT'];

// stdout belongs to command output, so only warnings and errors are emitted unless asked for.
const DEFAULT_LOG_LEVEL: LogLevel = 'WARN';

const defaultValues = {
  region: process.env.AWS_REGION,
  environment: process.env.ENVIRONMENT || 'N/A',
};

export interface InvocationContext {
  command: string;
  invocationId: string;
  packageJsonPath?: string;
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.trim().toUpperCase();
  return LOG_LEVELS.find((level) => level === normalized);
}

function getReleaseVersion(packageJsonPath = path.resolve(__dirname, '..', '..', 'package.json')): string {
  let version = 'unknown';
  try {
    const meta: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));
    if (typeof meta === 'object' && meta !== null && 'version' in meta && typeof meta.version === 'string') {
      version = meta.version || 'unknown';
    }
  } catch (error) {
    logger.debug(`Failed to read package.json for version: ${error instanceof Error ? error.message : 'Unknown error'}`);
  }
  return version;
}

function setContext(context: InvocationContext, module?: string) {
  const version = getReleaseVersion(context.packageJsonPath);
  logger.addPersistentLogAttributes({
    'invocation-id': context.invocationId,
    command: context.command,
    version,
    module: module,
  });

  // Add the context to all child loggers
  childLoggers.forEach((childLogger) => {
    childLogger.addPersistentLogAttributes({
      'invocation-id': context.invocationId,
      command: context.command,
      version,
    });
  });
}

const logger = new Logger({
  serviceName: process.env.POWERTOOLS_SERVICE_NAME || 'cloud-starter',
  logLevel: parseLogLevel(process.env.LOG_LEVEL ?? process.env.POWERTOOLS_LOG_LEVEL) ?? DEFAULT_LOG_LEVEL,
  persistentLogAttributes: {
    ...defaultValues,
  },
});

function createChildLogger(module: string): Logger {
  const childLogger = logger.createChild({
    persistentLogAttributes: {
      module: module,
    },
  });

  childLoggers.push(childLogger);
  return childLogger;
}

type LogAttributes = {
  [key: string]: unknown;
};

function addPersistentContextToChildLogger(attributes: LogAttributes) {
  childLoggers.forEach((childLogger) => {
    childLogger.addPersistentLogAttributes(attributes);
  });
}

export { addPersistentContextToChildLogger, createChildLogger, logger, setContext };
