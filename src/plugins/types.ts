/**
 * Plugin System — Types
 *
 * A plugin is a directory bundling skills, agents, commands, hooks and
 * MCP servers, described by `.claude-plugin/plugin.json`.
 */

import { z } from 'zod';
import type { DocumentDiagnostic, LoadedDocument } from '../documents/types.js';
import type { McpServerConfig } from '../evaluation/server-config.js';

export const MANIFEST_DIR = '.claude-plugin';
export const MANIFEST_FILENAME = 'plugin.json';

const pathList = z.union([z.string(), z.array(z.string())]);

/**
 * Plugin manifest (plugin.json)
 */
export const PluginManifestSchema = z
    .object({
        /** Unique plugin name */
        name: z
            .string({ required_error: 'is required' })
            .regex(/^[a-z0-9]+(?:-[a-z0-9]+)*$/, 'must be lowercase kebab-case'),
        /** Semver version */
        version: z
            .string()
            .regex(/^\d+\.\d+\.\d+(?:[-+][0-9A-Za-z.-]+)?$/, 'must be a semver version')
            .default('0.0.0'),
        description: z.string().optional(),
        author: z
            .union([
                z.string(),
                z.object({ name: z.string(), email: z.string().optional(), url: z.string().optional() }),
            ])
            .optional(),
        homepage: z.string().optional(),
        repository: z.string().optional(),
        license: z.string().optional(),
        keywords: z.array(z.string()).optional(),

        /** Relative paths to skill directories */
        skills: pathList.optional(),
        /** Relative paths to command directories or files */
        commands: pathList.optional(),
        /** Relative paths to agent directories or files */
        agents: pathList.optional(),
        /** Relative path to hooks.json, or inline hooks */
        hooks: z.union([z.string(), z.record(z.unknown())]).optional(),
        /** Relative path to an .mcp.json file, or inline servers */
        mcpServers: z.union([z.string(), z.record(z.unknown())]).optional(),
    })
    .passthrough();

export type PluginManifest = z.infer<typeof PluginManifestSchema>;

/**
 * Loaded plugin with resolved components
 */
export interface LoadedPlugin {
    manifest: PluginManifest;
    /** Absolute path to the plugin directory */
    path: string;
    /** Absolute path of the manifest file */
    manifestPath: string;
    skills: LoadedDocument[];
    agents: LoadedDocument[];
    commands: LoadedDocument[];
    /** Namespaced `plugin__server` */
    mcpServers: Record<string, McpServerConfig>;
    diagnostics: DocumentDiagnostic[];
}
