import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import { DI } from './tokens.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import { formatAppError } from '../errors/formatter.js';
import { Err } from '../errors/factories.js';
import type { AppError, ContainerStage } from '../errors/app-error.js';
import type { Result } from '../runtime/result.js';
import { ok, err } from '../runtime/result.js';
import { createBootstrapLogger } from '../core/logging/bootstrap.js';
import { PinoLoggerFactory } from '../core/logging/create-logger.js';
import { NodeFileSystem } from '../infra/local/fs/index.js';
import { NodeMappedFile } from '../infra/local/mapped-file/index.js';
import { NodeGzip } from '../infra/local/gzip/index.js';
import { LocalDirectoryResolver, ROOT_DIR_ENV } from '../infra/local/directory-resolver/index.js';
import type { CodecSettings } from '../durable-core/codecs/codec.js';
import { Stowage } from '../engine/stowage.js';

let initialized = false;

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
  readonly env?: Record<string, string | undefined>;
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(env: Record<string, string | undefined>): Result<void, AppError> {
  // Tests may register config first; the composition root must not overwrite it.
  if (!container.isRegistered(DI.Config.App)) {
    const configResult = loadConfig({ env });
    if (configResult.kind === 'err') return err(configResult.error);
    container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
  }

  if (!container.isRegistered(DI.Config.CodecSettings)) {
    container.register<CodecSettings>(DI.Config.CodecSettings, {
      useFactory: instanceCachingFactory((c) => c.resolve<ValidatedConfig>(DI.Config.App).codec),
    });
  }
  return ok(undefined);
}

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME
// ═══════════════════════════════════════════════════════════════════════════

function detectRuntimeMode(env: Record<string, string | undefined>): RuntimeMode {
  // Env sniffing stays in the composition root.
  if (env['VITEST'] || env['NODE_ENV'] === 'test') return { kind: 'test' };
  return { kind: 'production' };
}

function registerRuntime(options: ContainerInitOptions, env: Record<string, string | undefined>): void {
  const mode = options.runtimeMode ?? detectRuntimeMode(env);
  container.register<RuntimeMode>(DI.Runtime.Mode, { useValue: mode });

  const terminator: ProcessTerminator =
    mode.kind === 'test' ? new ThrowingProcessTerminator() : new NodeProcessTerminator();
  container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });
}

// ═══════════════════════════════════════════════════════════════════════════
// PORTS AND SERVICES
// Level 1: ports (no deps beyond config). Level 2: Stowage.
// ═══════════════════════════════════════════════════════════════════════════

function registerPorts(env: Record<string, string | undefined>): void {
  const config = container.resolve<ValidatedConfig>(DI.Config.App);

  if (!container.isRegistered(DI.Logging.Factory)) {
    container.register(DI.Logging.Factory, {
      useFactory: instanceCachingFactory(() => new PinoLoggerFactory(config.logging.level)),
    });
  }
  if (!container.isRegistered(DI.Ports.FileSystem)) {
    container.register(DI.Ports.FileSystem, { useFactory: instanceCachingFactory(() => new NodeFileSystem()) });
  }
  if (!container.isRegistered(DI.Ports.MappedFile)) {
    container.register(DI.Ports.MappedFile, { useFactory: instanceCachingFactory(() => new NodeMappedFile()) });
  }
  if (!container.isRegistered(DI.Ports.Compression)) {
    container.register(DI.Ports.Compression, {
      useFactory: instanceCachingFactory((c) => new NodeGzip(c.resolve<CodecSettings>(DI.Config.CodecSettings).gzipLevel)),
    });
  }
  if (!container.isRegistered(DI.Ports.DirectoryResolver)) {
    container.register(DI.Ports.DirectoryResolver, {
      useFactory: instanceCachingFactory(
        () => new LocalDirectoryResolver({ ...env, [ROOT_DIR_ENV]: config.paths.rootDir ?? undefined })
      ),
    });
  }
}

function registerServices(): void {
  container.register(DI.Services.Stowage, {
    useFactory: instanceCachingFactory((c) => c.resolve(Stowage)),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Wire config, runtime, ports and services. Idempotent.
 * Returns ConfigInvalid instead of exiting so the caller picks the exit path.
 */
export function initializeContainer(options: ContainerInitOptions = {}): Result<void, AppError> {
  if (initialized) return ok(undefined);

  const env = options.env ?? process.env;
  const log = createBootstrapLogger('container');

  const configured = registerConfig(env);
  if (configured.kind === 'err') {
    log.error({ error: formatAppError(configured.error) }, 'configuration rejected');
    return configured;
  }

  const stages: readonly (readonly [ContainerStage, () => void])[] = [
    ['runtime', () => registerRuntime(options, env)],
    ['ports', () => registerPorts(env)],
    ['services', registerServices],
  ];
  for (const [stage, register] of stages) {
    try {
      register();
    } catch (e) {
      return err(Err.containerFailed(stage, e));
    }
  }

  initialized = true;
  log.debug('container initialized');
  return ok(undefined);
}

export function isInitialized(): boolean {
  return initialized;
}

/** Tests only: drop every registration and instance. */
export function resetContainer(): void {
  container.clearInstances();
  container.reset();
  initialized = false;
}

export { container };
