import { z } from "zod";

// ============================================================================
// Primitives
// ============================================================================

export const FlavorSchema = z.enum(["miniconda", "anaconda"]);
/**
 * Conda distribution to install
 * - `miniconda`: minimal installer, latest release
 * - `anaconda`: full distribution, pinned release
 */
export type Flavor = z.infer<typeof FlavorSchema>;

// Environment names end up in shell scripts and conda command lines
export const EnvironmentNameSchema = z
  .string()
  .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, "environment names may only contain letters, digits, '.', '_' and '-'");

// ============================================================================
// Configuration
// ============================================================================

export const EnvironmentDescriptorSchema = z.object({
  // Interpreter version pin passed as python=<version>
  python: z.string().min(1),
  packages: z
    .object({
      // Installed with `conda install`
      conda: z.array(z.string().min(1)).default([]),
      // Installed with `pip install` inside the environment
      pip: z.array(z.string().min(1)).default([]),
    })
    .default({}),
  channels: z.array(z.string().min(1)).default([]),
});
export type EnvironmentDescriptor = z.infer<typeof EnvironmentDescriptorSchema>;

export const EnvironmentsConfigSchema = z.object({
  environments: z.record(EnvironmentNameSchema, EnvironmentDescriptorSchema),
});
export type EnvironmentsConfig = z.infer<typeof EnvironmentsConfigSchema>;

export interface EnvironmentSummary {
  name: string;
  python: string;
}

// ============================================================================
// Platform
// ============================================================================

/** Immutable description of the host, derived once at startup */
export interface PlatformDescriptor {
  readonly os: string;
  readonly arch: string;
}

// ============================================================================
// Results
// ============================================================================

export type CondaInstallResult =
  | { status: "on-path" }
  | { status: "found"; condaScript: string }
  | { status: "installed"; installDir: string; condaScript: string; shellFiles: string[] };

export interface RequirementsInstallResult {
  python: string;
  requirements: string;
}
