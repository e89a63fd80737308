/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for DI tokens, grouped by layer.
 *
 * ADDING A PORT OR SERVICE:
 * 1. Add a token here under the right namespace
 * 2. Register it in container.ts (skip when a test already registered one)
 * 3. Use @inject(DI.Namespace.Token) in consumers
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // PORTS (infra adapters behind interfaces)
  // ═══════════════════════════════════════════════════════════════════
  Ports: {
    /** Files and directory trees */
    FileSystem: Symbol('Ports.FileSystem'),
    /** Fixed-length file regions (the *Memmap operations) */
    MappedFile: Symbol('Ports.MappedFile'),
    /** gzip */
    Compression: Symbol('Ports.Compression'),
    /** Directory kind + project to absolute path */
    DirectoryResolver: Symbol('Ports.DirectoryResolver'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // SERVICES
  // ═══════════════════════════════════════════════════════════════════
  Services: {
    /** Definition-to-DiskFile facade */
    Stowage: Symbol('Services.Stowage'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════
  Logging: {
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // RUNTIME (process-level behavior, injected for explicitness)
  // ═══════════════════════════════════════════════════════════════════
  Runtime: {
    Mode: Symbol('Runtime.Mode'),
    /** Process terminator (composition roots only) */
    ProcessTerminator: Symbol('Runtime.ProcessTerminator'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Complete validated configuration. */
    App: Symbol('Config.App'),
    /** Encoder settings derived from App. */
    CodecSettings: Symbol('Config.CodecSettings'),
  },
} as const;
