import type { ToolDescriptor } from './tool-registry.js';

/**
 * Which tools the model may see.
 *
 * `exclude` always wins: a name in both sets is excluded. When `include` is
 * present, only its names can pass, so an empty include set admits nothing.
 */
export interface ToolFilterPolicy {
  readonly exclude: ReadonlySet<string>;
  readonly include?: ReadonlySet<string>;
}

/** Tools hidden from the model unless configured otherwise */
export const DEFAULT_EXCLUDED_TOOLS: readonly string[] = ['esql'];

export function createToolFilterPolicy(options: {
  exclude?: Iterable<string>;
  include?: Iterable<string>;
} = {}): ToolFilterPolicy {
  const exclude = new Set(options.exclude ?? DEFAULT_EXCLUDED_TOOLS);
  if (options.include === undefined) {
    return Object.freeze({ exclude });
  }
  return Object.freeze({ exclude, include: new Set(options.include) });
}

export const DEFAULT_TOOL_FILTER_POLICY: ToolFilterPolicy = createToolFilterPolicy();

export function isToolAllowed(name: string, policy: ToolFilterPolicy): boolean {
  if (policy.exclude.has(name)) {
    return false;
  }
  return policy.include === undefined || policy.include.has(name);
}

/**
 * Descriptors the policy admits, in their original order
 */
export function filterTools(descriptors: readonly ToolDescriptor[], policy: ToolFilterPolicy): ToolDescriptor[] {
  return descriptors.filter((descriptor) => isToolAllowed(descriptor.name, policy));
}

/**
 * Names the policy removed, in their original order
 */
export function excludedToolNames(descriptors: readonly ToolDescriptor[], policy: ToolFilterPolicy): string[] {
  return descriptors
    .filter((descriptor) => !isToolAllowed(descriptor.name, policy))
    .map((descriptor) => descriptor.name);
}
