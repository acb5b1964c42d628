import { existsSync, readFileSync } from 'fs';
import dotenv from 'dotenv';
import {
  CONFIG_APIKEY,
  CONFIG_SERVER,
  DEFAULT_CONFIG_FILES,
  DEFAULT_DNSDB_SERVER,
} from './constants.js';
import { ConfigurationError } from './errors.js';

// the settings read from config files and the environment
export interface DnsdbConfig {
  server: string;
  apiKey: string;
}

// the default config files that exist on this system
export function findConfigFiles(candidates: readonly string[] = DEFAULT_CONFIG_FILES): string[] {
  return candidates.filter(file => existsSync(file));
}

// read shell-style KEY=value config files, later files and then the environment take precedence
export function loadConfig(
  files: readonly string[],
  env: NodeJS.ProcessEnv = process.env
): DnsdbConfig {
  if (files.length === 0 && !env[CONFIG_APIKEY]) {
    throw new ConfigurationError('No config files to parse.');
  }

  const values: Record<string, string> = {};
  for (const file of files) {
    let contents: string;
    try {
      contents = readFileSync(file, 'utf8');
    } catch (error) {
      throw new ConfigurationError(`Cannot read config file ${file}: ${String(error)}`);
    }
    Object.assign(values, dotenv.parse(contents));
  }

  for (const key of [CONFIG_SERVER, CONFIG_APIKEY]) {
    const value = env[key];
    if (value) {
      values[key] = value;
    }
  }

  const apiKey = values[CONFIG_APIKEY];
  if (!apiKey) {
    throw new ConfigurationError(`${CONFIG_APIKEY} not defined in config file`);
  }

  return {
    server: values[CONFIG_SERVER] || DEFAULT_DNSDB_SERVER,
    apiKey,
  };
}
