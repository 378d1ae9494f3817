import type { z } from "zod";
import { StageConfigError, UnknownStageKindError } from "./errors.js";
import type { Stage } from "./types.js";

/**
 * Registry of stage kinds, so pipelines can be assembled from configuration.
 * Each kind validates its own options before a stage is built.
 */

export interface StageDefinition<TValue, TOptions = unknown> {
  description: string;
  optionsSchema: z.ZodType<TOptions, z.ZodTypeDef, unknown>;
  create: (options: TOptions) => Stage<TValue>;
}

interface RegisteredStage<TValue> {
  kind: string;
  description: string;
  build: (options: unknown) => Stage<TValue>;
}

export class StageRegistry<TValue> {
  private kindsByName = new Map<string, RegisteredStage<TValue>>();

  register<TOptions>(kind: string, definition: StageDefinition<TValue, TOptions>): this {
    if (this.kindsByName.has(kind)) {
      throw new Error(`Stage kind already registered: ${kind}`);
    }

    this.kindsByName.set(kind, {
      kind,
      description: definition.description,
      build: (options) => {
        const parsed = definition.optionsSchema.safeParse(options ?? {});
        if (!parsed.success) {
          throw new StageConfigError(
            kind,
            parsed.error.issues.map((issue) =>
              issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
            ),
          );
        }
        return definition.create(parsed.data);
      },
    });
    return this;
  }

  has(kind: string): boolean {
    return this.kindsByName.has(kind);
  }

  get(kind: string): { kind: string; description: string } | undefined {
    const registered = this.kindsByName.get(kind);
    return registered ? { kind: registered.kind, description: registered.description } : undefined;
  }

  kinds(): string[] {
    return Array.from(this.kindsByName.keys());
  }

  /**
   * Build a stage of the given kind.
   *
   * @throws {UnknownStageKindError} when the kind was never registered
   * @throws {StageConfigError} when the options fail validation
   */
  create(kind: string, options?: unknown): Stage<TValue> {
    const registered = this.kindsByName.get(kind);
    if (!registered) {
      throw new UnknownStageKindError(kind, this.kinds());
    }
    return registered.build(options);
  }
}
