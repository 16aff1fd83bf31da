/**
 * Model profile management.
 *
 * Provides centralized model configuration through profiles.yml files, so a
 * definition can say `model: fast-cheap` and the deployment decides what that
 * means (e.g., dev vs prod).
 *
 * Resolution order (low to high priority):
 * 1. default profile (fallback)
 * 2. Named profile, or the provider and name parsed from the reference
 * 3. override profile (trumps all)
 */

import { readFileSync, existsSync } from "fs";
import { join } from "path";
import { z } from "zod";
import type { ModelConfig, ModelProfileConfig } from "./types";
import { ConfigError } from "./errors";
import { parseMapping } from "./frontmatter";
import { formatZodIssues } from "./schemas";
import { logger } from "./logger";

export const DEFAULT_PROVIDER = "openai";
export const PROFILES_FILE = "profiles.yml";

const ModelProfileSchema = z.object({
  name: z.string().min(1),
  provider: z.string().min(1).optional(),
  base_url: z.string().optional(),
  temperature: z.number().optional(),
  max_tokens: z.number().int().positive().optional(),
  top_p: z.number().optional(),
  top_k: z.number().int().optional(),
  frequency_penalty: z.number().optional(),
  presence_penalty: z.number().optional(),
  seed: z.number().int().optional(),
});

const ProfilesFileSchema = z.object({
  model_profiles: z.record(ModelProfileSchema).default({}),
  default: z.string().optional(),
  override: z.string().optional(),
});

// Cache loaded profile managers by directory
const profileManagerCache: Map<string, ProfileManager> = new Map();

/**
 * Split `provider/name` or `provider:name`. A plain name gets the default provider.
 */
export function parseModelReference(reference: string): ModelConfig {
  const match = /^([A-Za-z0-9_.-]+)[/:](.+)$/.exec(reference);
  if (match) {
    return { provider: match[1].toLowerCase(), name: match[2] };
  }
  return { provider: DEFAULT_PROVIDER, name: reference };
}

/**
 * Manages model profiles from profiles.yml files.
 *
 * @example
 * ```typescript
 * const manager = new ProfileManager("config/profiles.yml");
 * manager.resolveModelConfig("fast-cheap");
 * // { provider: 'cerebras', name: 'llama-3.3-70b', temperature: 0.6 }
 * manager.resolveModelConfig("anthropic/claude-3-5-haiku-latest");
 * // { provider: 'anthropic', name: 'claude-3-5-haiku-latest' }
 * ```
 */
export class ProfileManager {
  private profiles: Record<string, ModelProfileConfig> = {};
  private defaultProfile: string | undefined;
  private overrideProfile: string | undefined;
  readonly profilesFile: string | undefined;

  constructor(profilesFile?: string) {
    this.profilesFile = profilesFile;
    if (profilesFile) {
      this.loadProfiles(profilesFile);
    }
  }

  /**
   * Get or create a ProfileManager for a directory.
   * Caches instances by directory to avoid re-reading profiles.yml.
   */
  static getInstance(configDir: string): ProfileManager {
    const cached = profileManagerCache.get(configDir);
    if (cached) return cached;

    const profilesPath = join(configDir, PROFILES_FILE);
    // No profiles file - empty manager
    const manager = existsSync(profilesPath) ? new ProfileManager(profilesPath) : new ProfileManager();
    profileManagerCache.set(configDir, manager);
    return manager;
  }

  static clearCache(): void {
    profileManagerCache.clear();
  }

  private loadProfiles(profilesFile: string): void {
    if (!existsSync(profilesFile)) {
      throw new ConfigError(`Profiles file not found: ${profilesFile}`, profilesFile);
    }

    const raw = parseMapping(readFileSync(profilesFile, "utf-8"), profilesFile, "Profiles file");
    const parsed = ProfilesFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(
        `Invalid profiles file: ${formatZodIssues(parsed.error).join("; ")}`,
        profilesFile
      );
    }

    this.profiles = parsed.data.model_profiles;
    this.defaultProfile = parsed.data.default;
    this.overrideProfile = parsed.data.override;
  }

  getProfile(name: string): ModelProfileConfig | undefined {
    return this.profiles[name];
  }

  getDefaultProfile(): string | undefined {
    return this.defaultProfile;
  }

  /**
   * Resolve a model reference into a full configuration.
   *
   * Fields the referenced profile leaves out are taken from the default
   * profile; fields set by the override profile always win.
   */
  resolveModelConfig(reference: string): ModelConfig {
    const layers: Partial<ModelConfig>[] = [];

    if (this.defaultProfile) {
      const defaultCfg = this.getProfile(this.defaultProfile);
      if (defaultCfg) {
        layers.push(defaultCfg);
      } else {
        logger.warn("Profiles", `Default profile '${this.defaultProfile}' not found`);
      }
    }

    layers.push(this.getProfile(reference) ?? parseModelReference(reference));

    if (this.overrideProfile) {
      const overrideCfg = this.getProfile(this.overrideProfile);
      if (overrideCfg) {
        layers.push(overrideCfg);
      } else {
        logger.warn("Profiles", `Override profile '${this.overrideProfile}' not found`);
      }
    }

    return mergeLayers(layers, reference);
  }
}

function mergeLayers(layers: Partial<ModelConfig>[], reference: string): ModelConfig {
  let result: ModelConfig = { name: reference, provider: DEFAULT_PROVIDER };
  for (const layer of layers) {
    result = { ...result, ...layer };
  }
  return result;
}

/**
 * Convenience function to resolve a model reference.
 *
 * @param configDir - Directory searched for profiles.yml
 * @param profilesFile - Explicit path to profiles.yml (overrides auto-discovery)
 */
export function resolveModelConfig(reference: string, configDir: string, profilesFile?: string): ModelConfig {
  const manager = profilesFile ? new ProfileManager(profilesFile) : ProfileManager.getInstance(configDir);
  return manager.resolveModelConfig(reference);
}
