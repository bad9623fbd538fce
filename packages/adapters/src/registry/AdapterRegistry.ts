import type { JsonAdapter } from '../adapters/JsonAdapter';
import { collectionAdapterFactory } from '../adapters/collectionAdapters';
import { enumAdapterFactory } from '../adapters/enumAdapters';
import { standardAdapterFactory } from '../adapters/standardAdapters';
import { InvalidDeclarationError, UnsupportedTypeError } from '../errors';
import { GeneratedAdapterFactory, type AdapterSource } from '../records/GeneratedAdapterFactory';
import type { Logger } from '../shared/logger';
import type { RawType } from '../types/RawType';
import { toDescriptor, type TypeDescriptor } from '../types/TypeDescriptor';
import { DeferredAdapter } from './DeferredAdapter';
import {
  ExactAdapterFactory,
  exactAdapterFactory,
  type AdapterResolver,
  type JsonAdapterFactory,
} from './JsonAdapterFactory';
import {
  registryOptionsSchema,
  type RegistryOptions,
  type ResolvedRegistryOptions,
} from './registryOptions';

const BUILT_IN_FACTORIES: readonly JsonAdapterFactory[] = [
  standardAdapterFactory,
  collectionAdapterFactory,
  enumAdapterFactory,
];

/**
 * The cache holds adapters keyed by descriptor, so every entry was produced
 * for exactly the requested `T`.
 */
const typedAdapter = <T>(adapter: JsonAdapter<unknown>): JsonAdapter<T> =>
  adapter as JsonAdapter<T>;

/**
 * Resolves adapters through an ordered factory chain: explicitly added
 * factories first, then generated record adapters, then the built-ins.
 *
 * Each descriptor is built at most once per registry. While a descriptor is
 * being built, repeated requests for it (a type that refers to itself) get a
 * deferred placeholder that forwards to the finished adapter. Nothing built
 * during a resolution that fails is cached.
 */
export class AdapterRegistry implements AdapterResolver {
  private readonly cache = new Map<string, JsonAdapter<unknown>>();
  private readonly pending = new Map<string, DeferredAdapter<unknown>>();
  /** Built during the current outermost resolution, cached once it succeeds. */
  private readonly staged = new Map<string, JsonAdapter<unknown>>();
  private readonly factories: readonly JsonAdapterFactory[];
  private readonly logger: Logger;
  private readonly debug: boolean;

  constructor(
    private readonly explicitFactories: readonly JsonAdapterFactory[],
    private readonly sources: readonly AdapterSource[],
    private readonly options: ResolvedRegistryOptions
  ) {
    const generated: JsonAdapterFactory[] =
      sources.length === 0 ? [] : [new GeneratedAdapterFactory(sources)];
    this.factories = [...explicitFactories, ...generated, ...BUILT_IN_FACTORIES];
    this.logger = options.logger;
    this.debug = options.debug;
  }

  static builder(): AdapterRegistryBuilder {
    return new AdapterRegistryBuilder();
  }

  adapterFor<T>(type: TypeDescriptor<T> | RawType<T>): JsonAdapter<T> {
    return typedAdapter<T>(this.resolve(toDescriptor(type)));
  }

  /** A builder seeded with this registry's factories and options. */
  newBuilder(): AdapterRegistryBuilder {
    return new AdapterRegistryBuilder(this.explicitFactories, this.sources, this.options);
  }

  private resolve(type: TypeDescriptor): JsonAdapter<unknown> {
    const key = type.key;
    const known = this.cache.get(key) ?? this.staged.get(key) ?? this.pending.get(key);
    if (known !== undefined) return known;

    if (!type.isResolved) {
      throw new InvalidDeclarationError(
        `Cannot resolve an adapter for ${type.toString()}: it still contains type variables`
      );
    }

    const outermost = this.pending.size === 0;
    const deferred = new DeferredAdapter<unknown>(type);
    this.pending.set(key, deferred);
    try {
      const adapter = this.create(type);
      deferred.bind(adapter);
      this.staged.set(key, adapter);
      if (outermost) {
        for (const [stagedKey, staged] of this.staged) {
          this.cache.set(stagedKey, staged);
        }
      }
      return adapter;
    } finally {
      this.pending.delete(key);
      if (outermost) {
        // Adapters built inside a failed resolution may hold unbound placeholders.
        this.staged.clear();
      }
    }
  }

  private create(type: TypeDescriptor): JsonAdapter<unknown> {
    for (const factory of this.factories) {
      const adapter = factory.create(type, this);
      if (adapter === null) continue;
      if (this.debug) {
        this.logger.debug('[AdapterRegistry] resolved', {
          type: type.toString(),
          adapter: adapter.toString(),
          factory: factory.name ?? 'anonymous',
        });
      }
      return adapter;
    }
    throw new UnsupportedTypeError(type);
  }
}

export class AdapterRegistryBuilder {
  private readonly explicitFactories: JsonAdapterFactory[];
  private readonly sources: AdapterSource[];
  private options: RegistryOptions;

  constructor(
    explicitFactories: readonly JsonAdapterFactory[] = [],
    sources: readonly AdapterSource[] = [],
    options: RegistryOptions = {}
  ) {
    this.explicitFactories = [...explicitFactories];
    this.sources = [...sources];
    this.options = { ...options };
  }

  /** Appends a factory; earlier factories take precedence. */
  add(factory: JsonAdapterFactory): this;
  /** Serves `adapter` for exactly `type`, qualifiers included. */
  add<T>(type: TypeDescriptor<T> | RawType<T>, adapter: JsonAdapter<T>): this;
  add<T>(
    target: JsonAdapterFactory | TypeDescriptor<T> | RawType<T>,
    adapter?: JsonAdapter<T>
  ): this {
    if (isFactory(target)) {
      this.explicitFactories.push(target);
      return this;
    }
    if (adapter === undefined) {
      throw new InvalidDeclarationError(`No adapter given for ${target.toString()}`);
    }
    this.explicitFactories.push(exactAdapterFactory(target, adapter));
    return this;
  }

  /** Registers generated adapters, consulted after every explicit factory. */
  addRecords(...sources: AdapterSource[]): this {
    this.sources.push(...sources);
    return this;
  }

  withOptions(options: RegistryOptions): this {
    this.options = { ...this.options, ...options };
    return this;
  }

  build(): AdapterRegistry {
    const options = registryOptionsSchema.parse(this.options);
    warnOnShadowedRegistrations(this.explicitFactories, options.logger);
    return new AdapterRegistry(this.explicitFactories, this.sources, options);
  }
}

function isFactory<T>(
  target: JsonAdapterFactory | TypeDescriptor<T> | RawType<T>
): target is JsonAdapterFactory {
  return 'create' in target && typeof target.create === 'function';
}

function warnOnShadowedRegistrations(
  factories: readonly JsonAdapterFactory[],
  logger: Logger
): void {
  const seen = new Set<string>();
  for (const factory of factories) {
    if (!(factory instanceof ExactAdapterFactory)) continue;
    const key = factory.type.key;
    if (seen.has(key)) {
      logger.warn('[AdapterRegistry] duplicate registration is unreachable', {
        type: factory.type.toString(),
      });
    }
    seen.add(key);
  }
}
