/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Languages and flavors are ordered sets: each matrix entry must be unique
function isUnique(values: string[]): boolean {
  return new Set(values).size === values.length;
}

// Zod schemas
export const TemplateConfigSchema = z.object({
  path: z.string().min(1),
  sourceDir: z.string().min(1),
  mainDocument: z.string().min(1),
  versionFile: z.string().min(1),
  artifactName: z.string().min(1),
});

// Priority tier is documentation/ordering only, the scheduler ignores it
export const PrioritySchema = z.union([z.literal(1), z.literal(2), z.literal(3)]);

export const FormatSpecSchema = z.object({
  enabled: z.boolean(),
  priority: PrioritySchema,
  options: z.record(z.string(), z.unknown()).default({}),
});

export const BuildSettingsSchema = z.object({
  parallel: z.boolean(),
  maxWorkers: z.number().int().min(1),
  validate: z.boolean(),
  cleanBefore: z.boolean(),
  verifyFonts: z.boolean(),
  outputDir: z.string().min(1),
  distDir: z.string().min(1),
  tempDir: z.string().min(1),
  taskTimeout: z.number().int().nonnegative(), // In milliseconds (0 disables)
});

export const AdvancedSettingsSchema = z.object({
  failFast: z.boolean(),
  retryCount: z.number().int().nonnegative(),
  continueOnError: z.boolean(),
});

export const ValidationSettingsSchema = z.object({
  requiredFonts: z.array(z.string()),
  checkImages: z.boolean(),
});

export const AssemblySettingsSchema = z.object({
  maxDepth: z.number().int().positive(),
  mode: z.enum(["passthrough", "strip"]),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const BuildConfigSchema = z.object({
  version: z.string().regex(/^\d+\.\d+$/, "Expected 'X.Y'"),
  template: TemplateConfigSchema,
  languages: z
    .array(z.string().regex(/^[A-Z]{2,3}$/, "Expected an upper-case language code"))
    .min(1, "At least one language must be specified")
    .refine(isUnique, "Languages must be unique"),
  flavors: z
    .array(z.string().min(1))
    .min(1, "At least one flavor must be specified")
    .refine(isUnique, "Flavors must be unique"),
  // Attribute names defined for a flavor, on top of `flavor` itself
  flavorAttributes: z.record(z.string(), z.array(z.string())),
  formats: z.record(z.string(), FormatSpecSchema),
  build: BuildSettingsSchema,
  advanced: AdvancedSettingsSchema,
  validation: ValidationSettingsSchema,
  assembly: AssemblySettingsSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialBuildConfigSchema = BuildConfigSchema.partial().extend({
  template: TemplateConfigSchema.partial().optional(),
  build: BuildSettingsSchema.partial().optional(),
  advanced: AdvancedSettingsSchema.partial().optional(),
  validation: ValidationSettingsSchema.partial().optional(),
  assembly: AssemblySettingsSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type Priority = z.infer<typeof PrioritySchema>;
export type TemplateConfig = z.infer<typeof TemplateConfigSchema>;
export type FormatSpec = z.infer<typeof FormatSpecSchema>;
export type BuildSettings = z.infer<typeof BuildSettingsSchema>;
export type AdvancedSettings = z.infer<typeof AdvancedSettingsSchema>;
export type ValidationSettings = z.infer<typeof ValidationSettingsSchema>;
export type AssemblySettings = z.infer<typeof AssemblySettingsSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type BuildConfig = z.infer<typeof BuildConfigSchema>;
export type PartialBuildConfig = z.infer<typeof PartialBuildConfigSchema>;
