/**
 * Generation entry point.
 *
 * Ties the layers together: a configured registry is populated by the
 * caller, then {@link generate} freezes it, collects the closure of the root
 * types and hands back what an external renderer needs.
 *
 * @packageDocumentation
 */

import { createRegistry } from './bindings/index.js';
import type { TypeRegistry } from './bindings/registry.js';
import type { Declaration, FormattingOptions, TypeBinding, TypeId } from './bindings/types.js';
import { collectClosure } from './closure/collector.js';
import { getDefaultConfig, toFormattingOptions } from './config/parser.js';
import type { Config } from './config/types.js';
import { Logger } from './utils/logger.js';

/**
 * Input to {@link generate}.
 */
export interface GenerateOptions {
  /** Populated registry. Frozen by the call. */
  readonly registry: TypeRegistry;
  /** Types whose declarations are wanted. */
  readonly roots: readonly TypeId[];
  /** Defaults apply when omitted. */
  readonly config?: Config;
}

/**
 * Everything the renderer consumes.
 */
export interface GenerationResult {
  readonly declarations: readonly Declaration[];
  readonly formatting: FormattingOptions;
  /** Root bindings, so callers can print the expression of each root. */
  readonly roots: readonly { readonly typeId: TypeId; readonly binding: TypeBinding }[];
}

function loggerFor(config: Config, component: string): Logger {
  return new Logger({ component, debugMode: config.logging.debug });
}

/**
 * Creates a registry with built-ins installed, honouring the registry and
 * logging settings of a configuration.
 */
export function createConfiguredRegistry(config: Config = getDefaultConfig()): TypeRegistry {
  return createRegistry({
    onConflict: config.registry.on_conflict,
    logger: loggerFor(config, 'TypeRegistry'),
  });
}

/**
 * Runs one generation.
 *
 * @throws UnregisteredTypeError if a reachable type has no definition.
 * @throws MalformedMetadataError if a root or a synthesized type is malformed.
 *
 * @example
 * ```typescript
 * const registry = createConfiguredRegistry(config);
 * registerSchema(registry, await loadSchema('types.toml'));
 * const { declarations, formatting } = generate({ registry, roots: ['User'], config });
 * ```
 */
export function generate(options: GenerateOptions): GenerationResult {
  const config = options.config ?? getDefaultConfig();
  const log = loggerFor(config, 'Generator');

  options.registry.freeze();

  try {
    const closure = collectClosure(options.registry, options.roots, {
      logger: log.child('ClosureCollector'),
    });
    return {
      declarations: closure.declarations,
      formatting: toFormattingOptions(config),
      roots: closure.roots,
    };
  } catch (error) {
    log.error('generation_failed', {
      roots: [...options.roots],
      reason: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }
}
