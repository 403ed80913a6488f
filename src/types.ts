export type AffectedConfig = {
  since?: string;
  head?: string;
  extensions?: string[];
  templates?: Record<string, string>;
};

export type PackageRecord = {
  name: string;
  manifestPath: string;
  dependencyPaths: string[];
};

export type Package = {
  name: string;
  directory: string;
  manifestPath: string;
  dependencies: string[];
};

export type AffectedSet = {
  directories: Set<string>;
  names: string[];
};

export type CommandLine = {
  program: string;
  args: string[];
};

export type AffectedPayload = {
  root: string;
  base?: string;
  head?: string;
  changedFiles: string[];
  affected: string[];
  excluded: string[];
};

export enum ErrorCodes {
  WORKSPACE_ERROR = 'WORKSPACE_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
  TEMPLATE_ERROR = 'TEMPLATE_ERROR',
  SPAWN_ERROR = 'SPAWN_ERROR',
}
