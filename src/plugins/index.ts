export { MANIFEST_DIR, MANIFEST_FILENAME, PluginManifestSchema } from './types.js';
export type { LoadedPlugin, PluginManifest } from './types.js';
export { PluginLoader, readManifest, discoverPlugins, expandPluginRoot, componentPaths, PLUGIN_ROOT_VARIABLE } from './loader.js';
export type { ManifestLocation, PluginLoadFailure } from './loader.js';
export { PluginDoctor, DEFAULT_MAX_SKILL_LINES } from './doctor.js';
export type { PluginIssue, PluginReport, PluginDoctorOptions } from './doctor.js';
export { PluginInstaller, summarize } from './installer.js';
export type { InstallStatus, InstallResult, InstallerOptions } from './installer.js';
export { installAgentFile, resolveAgentsDir, sha256, PREVIEW_LINES } from './agent-installer.js';
export type { InstallScope, AgentInstallOutcome } from './agent-installer.js';
export { scaffoldPlugin } from './scaffold.js';
export type { ScaffoldOptions, ScaffoldResult } from './scaffold.js';
