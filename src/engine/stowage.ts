import { inject, singleton } from 'tsyringe';
import type { Result } from 'neverthrow';
import { DI } from '../di/tokens.js';
import type { FileSystemPort } from '../ports/fs.port.js';
import type { MappedFilePort } from '../ports/mapped-file.port.js';
import type { CompressionPort } from '../ports/compression.port.js';
import type { DirectoryResolverPort } from '../ports/directory-resolver.port.js';
import type { ILoggerFactory } from '../core/logging/index.js';
import type { CodecSettings, ValueSchema, Codec } from '../durable-core/codecs/codec.js';
import type { PlainValue } from '../durable-core/codecs/plain.js';
import { jsonCodec } from '../durable-core/codecs/json.js';
import { yamlCodec } from '../durable-core/codecs/yaml.js';
import { plainCodec } from '../durable-core/codecs/plain.js';
import { emptyCodec } from '../durable-core/codecs/empty.js';
import type {
  BinaryFileDefinition,
  BinaryFileDefinitionInput,
  DefineOptions,
  FileDefinition,
  FileDefinitionInput,
} from '../durable-core/definition.js';
import { defineBinaryFile, defineFile } from '../durable-core/definition.js';
import type { DefinitionError } from '../durable-core/errors.js';
import type { DiskDeps } from './disk-file.js';
import { DiskFile } from './disk-file.js';
import { BinaryDiskFile } from './binary-disk-file.js';

export interface StowageCodecs {
  json<T>(schema: ValueSchema<T>): Codec<T>;
  yaml<T>(schema: ValueSchema<T>): Codec<T>;
  plain<T extends PlainValue>(schema: ValueSchema<T>): Codec<T>;
  empty(): Codec<null>;
}

/**
 * Entry point: binds validated definitions to the configured ports.
 *
 *   const state = stowage.define({ project: 'my-app', file: 'state', codec: stowage.codecs.json(StateSchema) });
 *   if (state.isOk()) await state.value.saveAtomic(current);
 */
@singleton()
export class Stowage {
  private readonly deps: DiskDeps;

  /** Codecs built with the configured settings. */
  readonly codecs: StowageCodecs;

  constructor(
    @inject(DI.Ports.FileSystem) fs: FileSystemPort,
    @inject(DI.Ports.MappedFile) mapped: MappedFilePort,
    @inject(DI.Ports.Compression) compression: CompressionPort,
    @inject(DI.Ports.DirectoryResolver) resolver: DirectoryResolverPort,
    @inject(DI.Logging.Factory) loggerFactory: ILoggerFactory,
    @inject(DI.Config.CodecSettings) settings: CodecSettings
  ) {
    this.deps = { fs, mapped, compression, resolver, logger: loggerFactory.create('disk') };
    this.codecs = {
      json: (schema) => jsonCodec(schema, settings),
      yaml: (schema) => yamlCodec(schema),
      plain: (schema) => plainCodec(schema),
      empty: () => emptyCodec(),
    };
  }

  file<T>(definition: FileDefinition<T>): DiskFile<T> {
    return new DiskFile(this.deps, definition);
  }

  binaryFile<T>(definition: BinaryFileDefinition<T>): BinaryDiskFile<T> {
    return new BinaryDiskFile(this.deps, definition);
  }

  /** `defineFile` followed by `file`. */
  define<T>(input: FileDefinitionInput<T>, options?: DefineOptions): Result<DiskFile<T>, DefinitionError> {
    return defineFile(input, options).map((d) => this.file(d));
  }

  defineBinary<T>(input: BinaryFileDefinitionInput<T>, options?: DefineOptions): Result<BinaryDiskFile<T>, DefinitionError> {
    return defineBinaryFile(input, options).map((d) => this.binaryFile(d));
  }
}
