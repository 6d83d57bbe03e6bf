/**
 * Assembly Resolver
 * Flattens a root document and its include graph into one self-contained
 * text, tracking conditional blocks for the selected flavor
 */

import { readFile, writeFile, mkdir } from "fs/promises";
import { dirname, resolve } from "node:path";
import { ConditionStack } from "./condition-stack";
import {
  parseConditional,
  parseInclude,
  namesDefined,
  substituteAttributes,
} from "./directives";
import type { ConditionalDirective, IncludeDirective } from "./directives";

export const DEFAULT_MAX_DEPTH = 10;

/**
 * passthrough: directive lines and inactive content stay in the output,
 *              conditional state is bookkeeping only
 * strip:       directive lines are dropped, inactive content is omitted
 */
export type AssemblyMode = "passthrough" | "strip";

export interface AssemblyOptions {
  baseDirectory: string;
  flavor: string;
  attributes?: readonly string[]; // Names defined for the flavor besides `flavor`
  values?: Readonly<Record<string, string>>; // Values for {name} substitution in include targets
  maxDepth?: number;
  mode?: AssemblyMode;
}

export type AssemblyDiagnosticType =
  | "missing-include"
  | "max-depth"
  | "circular-include"
  | "unbalanced-endif"
  | "unclosed-conditional";

export interface AssemblyDiagnostic {
  type: AssemblyDiagnosticType;
  file: string;
  line: number; // 1-based
  message: string;
}

export interface AssemblyResult {
  content: string;
  includes: number; // Include directives expanded
  files: string[]; // Distinct files read, root first
  diagnostics: AssemblyDiagnostic[];
}

interface Expansion {
  lines: string[];
  height: number; // Nesting levels below this file
  clean: boolean; // No guard marker was emitted inside
}

/**
 * Resolve an include target against the including file.
 * Relative targets resolve against the including file's directory, or
 * against the base directory when the including file sits there.
 */
export function resolveIncludePath(
  target: string,
  includingFile: string,
  baseDirectory: string,
): string {
  const parent = dirname(resolve(includingFile));
  const anchor = parent === resolve(baseDirectory) ? resolve(baseDirectory) : parent;
  return resolve(anchor, target);
}

function splitLines(content: string): { lines: string[]; trailingNewline: boolean } {
  if (content === "") return { lines: [], trailingNewline: false };

  const lines = content.split(/\r?\n/);
  const trailingNewline = lines[lines.length - 1] === "";
  if (trailingNewline) lines.pop();
  return { lines, trailingNewline };
}

async function readSource(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "EISDIR")) {
      return null;
    }
    throw error;
  }
}

/**
 * State for a single resolution call. Nothing survives the call.
 */
class Assembly {
  private readonly stack = new ConditionStack();
  private readonly ancestors: string[] = [];
  private readonly memo = new Map<string, Expansion>();
  private readonly defined: ReadonlySet<string>;
  private readonly values: Readonly<Record<string, string>>;
  private readonly maxDepth: number;
  private readonly mode: AssemblyMode;
  private readonly baseDirectory: string;

  readonly diagnostics: AssemblyDiagnostic[] = [];
  readonly files = new Set<string>();
  includes = 0;

  constructor(options: AssemblyOptions) {
    this.baseDirectory = resolve(options.baseDirectory);
    this.defined = new Set(["flavor", ...(options.attributes ?? [])]);
    this.values = { ...options.values, flavor: options.flavor };
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.mode = options.mode ?? "passthrough";
  }

  async run(rootPath: string): Promise<string> {
    const root = resolve(rootPath);
    const content = await readFile(root, "utf-8");
    const eol = content.includes("\r\n") ? "\r\n" : "\n";
    const { lines, trailingNewline } = splitLines(content);

    this.files.add(root);
    this.ancestors.push(root);
    const expansion = await this.expandLines(root, lines, 0);
    this.ancestors.pop();

    if (this.stack.depth > 0) {
      this.report("unclosed-conditional", root, lines.length, `${this.stack.depth} conditional block(s) left open`);
    }

    return expansion.lines.join(eol) + (trailingNewline ? eol : "");
  }

  private report(type: AssemblyDiagnosticType, file: string, line: number, message: string): void {
    this.diagnostics.push({ type, file, line, message });
  }

  private async expandLines(file: string, lines: string[], depth: number): Promise<Expansion> {
    const output: string[] = [];
    let height = 0;
    let clean = true;

    for (let i = 0; i < lines.length; i++) {
      const line = lines[i];

      const conditional = parseConditional(line);
      if (conditional) {
        this.applyConditional(conditional, file, i + 1, output);
        continue;
      }

      if (this.mode === "strip" && !this.stack.active) {
        continue;
      }

      const include = parseInclude(line);
      if (!include) {
        output.push(line);
        continue;
      }

      this.includes++;
      const expansion = await this.expandInclude(include, file, i + 1, depth);
      output.push(...expansion.lines);
      height = Math.max(height, expansion.height);
      clean = clean && expansion.clean;
    }

    return { lines: output, height, clean };
  }

  private applyConditional(
    directive: ConditionalDirective,
    file: string,
    line: number,
    output: string[],
  ): void {
    const passthrough = this.mode === "passthrough";

    switch (directive.kind) {
      case "ifdef":
      case "ifndef": {
        const defined = namesDefined(directive.names, this.defined);
        const satisfied = directive.kind === "ifdef" ? defined : !defined;

        if (directive.content.length > 0) {
          // Single-line form: no block is opened
          if (passthrough) output.push(directive.raw);
          else if (this.stack.active && satisfied) output.push(directive.content);
          return;
        }

        this.stack.push(satisfied);
        break;
      }
      case "ifeval":
        // Expressions are left to downstream tools
        this.stack.push(true);
        break;
      case "endif":
        if (!this.stack.pop()) {
          this.report("unbalanced-endif", file, line, `endif without matching ifdef/ifndef/ifeval`);
        }
        break;
    }

    if (passthrough) output.push(directive.raw);
  }

  private async expandInclude(
    directive: IncludeDirective,
    includingFile: string,
    line: number,
    depth: number,
  ): Promise<Expansion> {
    const childDepth = depth + 1;

    if (childDepth > this.maxDepth) {
      this.report("max-depth", includingFile, line, `Maximum include depth (${this.maxDepth}) exceeded`);
      return {
        lines: [`// ERROR: maximum include depth (${this.maxDepth}) exceeded: ${directive.raw}`],
        height: 0,
        clean: false,
      };
    }

    const target = substituteAttributes(directive.target, this.values);
    const path = resolveIncludePath(target, includingFile, this.baseDirectory);

    if (this.ancestors.includes(path)) {
      this.report("circular-include", includingFile, line, `Circular include of ${path}`);
      return {
        lines: [`// ERROR: circular include skipped: ${directive.raw}`],
        height: 0,
        clean: false,
      };
    }

    const body = await this.expandFile(path, childDepth);
    if (!body) {
      this.report("missing-include", includingFile, line, `Include file not found: ${path}`);
      return {
        lines: [`// WARNING: include file not found: ${directive.raw}`],
        height: 0,
        clean: false,
      };
    }

    return {
      lines: [`// begin ${directive.raw}`, ...body.lines, `// end ${directive.raw}`],
      height: body.height + 1,
      clean: body.clean,
    };
  }

  /**
   * Expand one included file, reusing an earlier expansion of the same file
   * when it emitted no guard marker and still fits under the depth limit.
   */
  private async expandFile(path: string, depth: number): Promise<Expansion | null> {
    const cached = this.memo.get(path);
    if (cached && depth + cached.height <= this.maxDepth) {
      return cached;
    }

    const content = await readSource(path);
    if (content === null) return null;

    this.files.add(path);
    const stackDepth = this.stack.depth;

    this.ancestors.push(path);
    const expansion = await this.expandLines(path, splitLines(content).lines, depth);
    this.ancestors.pop();

    if (expansion.clean && this.stack.depth === stackDepth) {
      this.memo.set(path, expansion);
    }

    return expansion;
  }
}

/**
 * Flatten a root document for one flavor
 */
export async function assemble(rootPath: string, options: AssemblyOptions): Promise<AssemblyResult> {
  const assembly = new Assembly(options);
  const content = await assembly.run(rootPath);

  return {
    content,
    includes: assembly.includes,
    files: [...assembly.files],
    diagnostics: assembly.diagnostics,
  };
}

/**
 * Flatten a root document and write the result to a single file
 */
export async function assembleToFile(
  rootPath: string,
  outputPath: string,
  options: AssemblyOptions,
): Promise<AssemblyResult> {
  const result = await assemble(rootPath, options);
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, result.content, "utf-8");
  return result;
}
