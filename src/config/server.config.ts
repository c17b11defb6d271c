import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { LogLevel } from '@nestjs/common';

import { ConfigurationError } from '../common/errors';
import {
  Distribution,
  Preset,
  ROLE_ORDER,
  RoleType,
  STANDARD_DISTRIBUTIONS,
  emptyDistribution,
  parseRoleType,
} from '../types/role.types';

export const SERVER_CONFIG = Symbol('SERVER_CONFIG');

export const DEFAULT_CONFIG_PATH = path.join(__dirname, '..', '..', 'config', 'server.json');

const logLevelSchema = z.enum(['error', 'warn', 'info', 'debug', 'verbose']);

const settingsSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).default(3000),
  host: z.string().min(1).default('0.0.0.0'),
  logLevel: logLevelSchema.default('info'),
  minPlayersPerRoom: z.coerce.number().int().default(1),
  maxPlayersPerRoom: z.coerce.number().int().default(20),
  defaultGameSize: z.coerce.number().int().default(5),
  roomCodeLength: z.coerce.number().int().default(5),
  countdownSeconds: z.coerce.number().int().min(0).default(5),
  randomSeed: z.string().min(1).optional(),
  cardsPath: z.string().min(1).optional(),
});

const roleDefinitionSchema = z.object({
  displayName: z.string().min(1),
  category: z.string().min(1),
  minCount: z.number().int().min(0).default(0),
  maxCount: z.number().int().min(0).default(10),
  alwaysRevealed: z.boolean().default(false),
});

const presetSchema = z.object({
  name: z.string().optional(),
  description: z.string().default(''),
  distributions: z.record(
    z.string().regex(/^\d+$/, 'player count keys must be integers'),
    z.record(z.string(), z.number().int().min(0)),
  ),
});

const fileSchema = z.object({
  server: settingsSchema.default({}),
  roles: z
    .object({
      available: z.record(z.string(), roleDefinitionSchema).default({}),
      presets: z.record(z.string(), presetSchema).default({}),
    })
    .default({}),
});

export type ServerSettings = z.infer<typeof settingsSchema>;
export type RoleDefinition = z.infer<typeof roleDefinitionSchema>;
type RawPreset = z.infer<typeof presetSchema>;

const DEFAULT_ROLE_DEFINITIONS: Record<string, RoleDefinition> = {
  leader: { displayName: 'Leader', category: 'Leader', minCount: 1, maxCount: 1, alwaysRevealed: true },
  guardian: { displayName: 'Guardian', category: 'Guardian', minCount: 0, maxCount: 10, alwaysRevealed: false },
  assassin: { displayName: 'Assassin', category: 'Assassin', minCount: 0, maxCount: 10, alwaysRevealed: false },
  traitor: { displayName: 'Traitor', category: 'Traitor', minCount: 0, maxCount: 10, alwaysRevealed: false },
};

const STANDARD_PRESET: RawPreset = {
  name: 'Standard',
  description: 'Balanced gameplay',
  distributions: Object.fromEntries(
    Object.entries(STANDARD_DISTRIBUTIONS).map(([count, dist]) => [
      count,
      Object.fromEntries(ROLE_ORDER.filter(r => dist[r] > 0).map(r => [r.toLowerCase(), dist[r]])),
    ]),
  ),
};

export class ServerConfig {
  constructor(
    readonly server: Readonly<ServerSettings>,
    readonly roleDefinitions: Readonly<Record<string, RoleDefinition>>,
    private readonly presets: ReadonlyMap<string, Preset>,
  ) {}

  getPreset(name: string): Preset | undefined {
    return this.presets.get(name);
  }

  presetNames(): string[] {
    return [...this.presets.keys()];
  }
}

/**
 * Validates file-shaped input on top of the built-in defaults. File entries
 * win over defaults key by key, so a config file can add presets without
 * repeating `standard`.
 */
export function buildServerConfig(input: unknown = {}): ServerConfig {
  const parsed = fileSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.join('.');
    throw new ConfigurationError(`invalid configuration at ${field}: ${issue.message}`, field);
  }

  const server = parsed.data.server;
  const roleDefinitions = { ...DEFAULT_ROLE_DEFINITIONS, ...parsed.data.roles.available };
  const rawPresets = { standard: STANDARD_PRESET, ...parsed.data.roles.presets };

  validateSettings(server);
  validateRoleDefinitions(roleDefinitions);

  const presets = new Map<string, Preset>();
  for (const [name, raw] of Object.entries(rawPresets)) {
    presets.set(name, toPreset(name, raw, roleDefinitions, server.maxPlayersPerRoom));
  }

  return new ServerConfig(Object.freeze(server), Object.freeze(roleDefinitions), presets);
}

/**
 * Reads the JSON config file (a missing file means defaults) and applies
 * environment overrides. Call `dotenv.config()` first to pick up `.env`.
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const filePath = env.CONFIG_PATH ?? DEFAULT_CONFIG_PATH;

  let input: unknown = {};
  if (fs.existsSync(filePath)) {
    try {
      input = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConfigurationError(`failed to read config file ${filePath}: ${reason}`, 'CONFIG_PATH');
    }
  } else if (env.CONFIG_PATH) {
    throw new ConfigurationError(`config file ${filePath} does not exist`, 'CONFIG_PATH');
  }

  const overrides: Record<string, string> = {};
  const envKeys: [string, keyof ServerSettings][] = [
    ['PORT', 'port'],
    ['HOST', 'host'],
    ['LOG_LEVEL', 'logLevel'],
    ['MIN_PLAYERS_PER_ROOM', 'minPlayersPerRoom'],
    ['MAX_PLAYERS_PER_ROOM', 'maxPlayersPerRoom'],
    ['COUNTDOWN_SECONDS', 'countdownSeconds'],
    ['RANDOM_SEED', 'randomSeed'],
    ['CARDS_PATH', 'cardsPath'],
  ];
  for (const [envKey, field] of envKeys) {
    const value = env[envKey];
    if (value !== undefined && value !== '') overrides[field] = value;
  }

  const file = isRecord(input) ? input : {};
  const fileServer = isRecord(file.server) ? file.server : {};
  return buildServerConfig({ ...file, server: { ...fileServer, ...overrides } });
}

export function nestLogLevels(level: ServerSettings['logLevel']): LogLevel[] {
  const levels: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];
  const cutoff = { error: 1, warn: 2, info: 3, debug: 4, verbose: 5 }[level];
  return levels.slice(0, cutoff + 1);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateSettings(server: ServerSettings) {
  if (server.minPlayersPerRoom < 1) {
    throw new ConfigurationError('minPlayersPerRoom must be at least 1', 'server.minPlayersPerRoom');
  }
  if (server.maxPlayersPerRoom < 1) {
    throw new ConfigurationError('maxPlayersPerRoom must be at least 1', 'server.maxPlayersPerRoom');
  }
  if (server.minPlayersPerRoom > server.maxPlayersPerRoom) {
    throw new ConfigurationError(
      'minPlayersPerRoom cannot be greater than maxPlayersPerRoom',
      'server.minPlayersPerRoom',
    );
  }
  if (server.roomCodeLength < 3) {
    throw new ConfigurationError('roomCodeLength must be at least 3', 'server.roomCodeLength');
  }

  server.defaultGameSize = Math.min(
    Math.max(server.defaultGameSize, server.minPlayersPerRoom),
    server.maxPlayersPerRoom,
  );
}

function validateRoleDefinitions(defs: Record<string, RoleDefinition>) {
  let hasLeader = false;
  for (const [name, def] of Object.entries(defs)) {
    if (def.minCount > def.maxCount) {
      throw new ConfigurationError(
        `role ${name}: minCount cannot be greater than maxCount`,
        `roles.available.${name}`,
      );
    }
    if (parseRoleType(def.category) === 'Leader') hasLeader = true;
  }
  if (!hasLeader) {
    throw new ConfigurationError('at least one Leader role must be defined', 'roles.available');
  }
}

function toPreset(
  name: string,
  raw: RawPreset,
  defs: Record<string, RoleDefinition>,
  maxPlayersPerRoom: number,
): Preset {
  const distributions = new Map<number, Distribution>();

  for (const [key, counts] of Object.entries(raw.distributions)) {
    const playerCount = Number(key);
    if (playerCount < 1 || playerCount > maxPlayersPerRoom) {
      throw new ConfigurationError(
        `preset ${name}: invalid player count ${playerCount}`,
        `roles.presets.${name}`,
      );
    }

    const dist = emptyDistribution();
    for (const [roleName, count] of Object.entries(counts)) {
      const def = defs[roleName];
      if (!def) {
        throw new ConfigurationError(`preset ${name}: unknown role ${roleName}`, `roles.presets.${name}`);
      }
      const roleType: RoleType = parseRoleType(def.category);
      dist[roleType] += count;
    }
    distributions.set(playerCount, Object.freeze(dist));
  }

  return Object.freeze({
    name: raw.name ?? name,
    description: raw.description,
    distributions,
  });
}
