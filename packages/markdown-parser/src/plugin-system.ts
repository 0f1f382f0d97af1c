import type { z } from "zod";
import type { DelimiterProcessor, DelimiterProcessorLookup } from "./delimiter/types";
import { EnvironmentFrozenError, InvalidConfigurationError, MarkdownParserError } from "./errors";
import type { InlineParserContext } from "./inline-parser/context";
import type { NodeId, NodeTree } from "./node-tree";

export interface InlineParser {
  /** Characters this parser wants first refusal on. */
  readonly characters: readonly string[];
  parse(context: InlineParserContext): boolean;
}

/** Runs over the finished arena of one text span, after the final delimiter sweep. */
export type InlineFinalizer = (tree: NodeTree, root: NodeId) => void;

export interface MarkdownPlugin {
  readonly name: string;
  register(environment: Environment): void;
}

export interface ConfigurableMarkdownPlugin<TConfig> {
  readonly name: string;
  readonly configKey: string;
  readonly configSchema: z.ZodType<TConfig, z.ZodTypeDef, unknown>;
  register(environment: Environment, config: TConfig): void;
}

export type ConfigInput = Record<string, unknown>;

interface RegisteredPlugin {
  name: string;
  validate(config: ConfigInput): InvalidConfigurationError | null;
  register(config: ConfigInput): void;
}

interface RegisteredInlineParser {
  parser: InlineParser;
  priority: number;
  order: number;
}

/**
 * Everything one conversion needs to know about the available syntax:
 * inline parsers, delimiter processors, finalizers and merged configuration.
 * Plugins register their parsers lazily on the first parse, after which the
 * environment is frozen.
 */
export class Environment implements DelimiterProcessorLookup {
  private plugins: RegisteredPlugin[] = [];
  private inlineParsers: RegisteredInlineParser[] = [];
  private parsersByCharacter = new Map<string, InlineParser[]>();
  private delimiterProcessors = new Map<string, DelimiterProcessor>();
  private finalizers: InlineFinalizer[] = [];
  private config: ConfigInput = {};
  private frozen = false;
  private initializing = false;

  constructor(config: ConfigInput = {}) {
    this.mergeConfig(config);
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  mergeConfig(config: ConfigInput): this {
    this.assertMutable("merge configuration");
    const candidate = mergeConfigObjects(this.config, config);
    for (const plugin of this.plugins) {
      const error = plugin.validate(candidate);
      if (error) throw error;
    }
    this.config = candidate;
    return this;
  }

  getConfig(key: string): unknown {
    return this.config[key];
  }

  addPlugin<TConfig>(plugin: MarkdownPlugin | ConfigurableMarkdownPlugin<TConfig>): this {
    this.assertMutable(`add plugin "${plugin.name}"`);
    const registered = toRegisteredPlugin(this, plugin);
    const error = registered.validate(this.config);
    if (error) throw error;
    this.plugins.push(registered);
    return this;
  }

  addInlineParser(parser: InlineParser, priority = 0): this {
    this.assertMutable("add an inline parser");
    this.inlineParsers.push({ parser, priority, order: this.inlineParsers.length });
    return this;
  }

  addDelimiterProcessor(processor: DelimiterProcessor): this {
    this.assertMutable("add a delimiter processor");
    const characters = new Set([processor.openingCharacter, processor.closingCharacter]);
    for (const char of characters) {
      if (this.delimiterProcessors.has(char)) {
        throw new MarkdownParserError(`A delimiter processor for "${char}" is already registered`);
      }
    }
    for (const char of characters) {
      this.delimiterProcessors.set(char, processor);
    }
    return this;
  }

  addInlineFinalizer(finalizer: InlineFinalizer): this {
    this.assertMutable("add an inline finalizer");
    this.finalizers.push(finalizer);
    return this;
  }

  getInlineParsersForCharacter(char: string): readonly InlineParser[] {
    this.freeze();
    return this.parsersByCharacter.get(char) ?? [];
  }

  getDelimiterProcessor(char: string): DelimiterProcessor | undefined {
    return this.delimiterProcessors.get(char);
  }

  getSpecialCharacters(): Set<string> {
    this.freeze();
    return new Set([...this.parsersByCharacter.keys(), ...this.delimiterProcessors.keys()]);
  }

  getFinalizers(): readonly InlineFinalizer[] {
    this.freeze();
    return this.finalizers;
  }

  /** Registers every plugin against the merged configuration; idempotent. */
  freeze() {
    if (this.frozen || this.initializing) return;
    const inlineParsers = [...this.inlineParsers];
    const delimiterProcessors = new Map(this.delimiterProcessors);
    const finalizers = [...this.finalizers];
    this.initializing = true;
    try {
      for (const plugin of this.plugins) {
        plugin.register(this.config);
      }
    } catch (error) {
      // a failed registration leaves the environment as it was before freezing
      this.inlineParsers = inlineParsers;
      this.delimiterProcessors = delimiterProcessors;
      this.finalizers = finalizers;
      throw error;
    } finally {
      this.initializing = false;
    }
    this.frozen = true;

    const ordered = [...this.inlineParsers].sort((a, b) => b.priority - a.priority || a.order - b.order);
    for (const { parser } of ordered) {
      for (const char of parser.characters) {
        const list = this.parsersByCharacter.get(char) ?? [];
        list.push(parser);
        this.parsersByCharacter.set(char, list);
      }
    }
  }

  private assertMutable(action: string) {
    if (this.frozen) throw new EnvironmentFrozenError(action);
  }
}

function toRegisteredPlugin<TConfig>(
  environment: Environment,
  plugin: MarkdownPlugin | ConfigurableMarkdownPlugin<TConfig>,
): RegisteredPlugin {
  if (!("configSchema" in plugin)) {
    const simple = plugin;
    return {
      name: simple.name,
      validate: () => null,
      register: () => simple.register(environment),
    };
  }

  const configurable = plugin;
  const parse = (config: ConfigInput) => configurable.configSchema.safeParse(config[configurable.configKey]);
  return {
    name: configurable.name,
    validate(config) {
      const result = parse(config);
      return result.success ? null : InvalidConfigurationError.fromIssues(configurable.configKey, result.error.issues);
    },
    register(config) {
      const result = parse(config);
      if (!result.success) {
        throw InvalidConfigurationError.fromIssues(configurable.configKey, result.error.issues);
      }
      configurable.register(environment, result.data);
    },
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function mergeConfigObjects(base: ConfigInput, override: ConfigInput): ConfigInput {
  const merged: ConfigInput = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const existing = merged[key];
    merged[key] = isPlainObject(existing) && isPlainObject(value) ? mergeConfigObjects(existing, value) : value;
  }
  return merged;
}
