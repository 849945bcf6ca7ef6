/**
 * Bootstrap Settings: YAML file + INPUT_* environment overrides.
 *
 * File (INPUT_CONFIG_PATH, default ./bootstrap.yaml), all keys optional:
 *   server:      https://rancher.example.com
 *   path:        /v3/connect/agent
 *   token_scope: CLUSTER | MACHINE
 *   ca_file:     /etc/pki/trust/anchors/additional-ca.pem
 *   output_file: ./agent.json
 *
 * Environment wins over the file. The token is read from INPUT_TOKEN only,
 * never from the file.
 *
 * Missing file → defaults. Malformed file, missing server or token → CONFIGURATION_ERROR.
 */

import * as fs from 'fs';
import * as yaml from 'yaml';
import { TrustBootstrapError, errorMessage } from '../errors.js';
import { TokenScope, parseServerUrl, parseTokenScope } from './token_scope.js';

export const DEFAULT_CONFIG_PATH = './bootstrap.yaml';

export interface BootstrapSettings {
  server: string;
  token: string;
  scope: TokenScope;
  /** Resource to fetch after trust is established. Empty = bootstrap only. */
  path: string;
  /** Where to write a non-empty verified CA bundle. Empty = don't write. */
  ca_file: string;
  /** Where to write the fetched resource. Empty = report it as an output. */
  output_file: string;
}

interface SettingsFile {
  server?: string;
  path?: string;
  token_scope?: string;
  ca_file?: string;
  output_file?: string;
}

const FILE_KEYS: (keyof SettingsFile)[] = ['server', 'path', 'token_scope', 'ca_file', 'output_file'];

function loadSettingsFile(configPath: string): SettingsFile {
  if (!fs.existsSync(configPath)) return {};

  let parsed: unknown;
  try {
    parsed = yaml.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new TrustBootstrapError('CONFIGURATION_ERROR', `Cannot parse ${configPath}: ${errorMessage(err)}`, err);
  }
  if (parsed === null || parsed === undefined) return {};
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new TrustBootstrapError('CONFIGURATION_ERROR', `${configPath} must contain a mapping`);
  }

  const file: SettingsFile = {};
  for (const key of FILE_KEYS) {
    const value: unknown = Reflect.get(parsed, key);
    if (value === undefined || value === null) continue;
    if (typeof value !== 'string') {
      throw new TrustBootstrapError('CONFIGURATION_ERROR', `${configPath}: '${key}' must be a string`);
    }
    file[key] = value;
  }
  return file;
}

function input(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[`INPUT_${name}`]?.trim();
  return value ? value : undefined;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): BootstrapSettings {
  const configPath = input(env, 'CONFIG_PATH') ?? DEFAULT_CONFIG_PATH;
  const file = loadSettingsFile(configPath);

  const server = input(env, 'SERVER') ?? file.server ?? '';
  const token = input(env, 'TOKEN') ?? '';

  if (!server) {
    throw new TrustBootstrapError('CONFIGURATION_ERROR', 'server is required (INPUT_SERVER or config file)');
  }
  parseServerUrl(server);
  if (!token) {
    throw new TrustBootstrapError('CONFIGURATION_ERROR', 'INPUT_TOKEN is required but was not provided.');
  }

  return {
    server,
    token,
    scope: parseTokenScope(input(env, 'TOKEN_SCOPE') ?? file.token_scope),
    path: input(env, 'PATH') ?? file.path ?? '',
    ca_file: input(env, 'CA_FILE') ?? file.ca_file ?? '',
    output_file: input(env, 'OUTPUT_FILE') ?? file.output_file ?? ''
  };
}
