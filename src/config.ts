import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import chokidar from "chokidar";
import { ConfigError } from "./errors";
import { parseLogLevel, type LogLevel } from "./logger";
import type { DevicePaths } from "./device/files";
import { DEFAULT_UDP_HOST, DEFAULT_UDP_PORT } from "./midi/constants";

/**
 * Contenu du fichier YAML (toutes les clés sont facultatives).
 */
export interface FileConfig {
  /** Périphériques MIDI série */
  midi?: {
    /** Chemin utilisé en entrée ET en sortie (prioritaire sur input/output) */
    device?: string;
    input?: string;
    output?: string;
  };
  /** Écoute des commandes */
  udp?: {
    host?: string;
    port?: number;
  };
  /** Niveau de log (rechargé à chaud) */
  log_level?: LogLevel;
}

/**
 * Options de la ligne de commande, prioritaires sur le fichier.
 */
export type ConfigOverrides = {
  config?: string;
  midi?: string;
  midiIn?: string;
  midiOut?: string;
  host?: string;
  port?: string | number;
  logLevel?: string;
};

/**
 * Configuration résolue, construite une fois au démarrage et passée aux composants.
 */
export interface GatewayConfig {
  midi: DevicePaths;
  udp: { host: string; port: number };
  logLevel: LogLevel;
  /** Fichier YAML utilisé (null si aucun) */
  configPath: string | null;
}

const DEFAULT_PATHS = ["config.yaml", path.join("config", "config.yaml")];

/**
 * Recherche un fichier de configuration existant parmi les chemins par défaut ou un chemin fourni.
 * @param customPath Chemin explicite à tester en priorité
 * @returns Le chemin trouvé ou null
 */
export async function findConfigPath(customPath?: string): Promise<string | null> {
  const candidates = customPath ? [customPath, ...DEFAULT_PATHS] : DEFAULT_PATHS;
  for (const p of candidates) {
    try {
      await fs.access(p);
      return p;
    } catch {
      // continue
    }
  }
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(obj: Record<string, unknown>, key: string, where: string): string | undefined {
  const v = obj[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "string" || v.trim() === "") {
    throw new ConfigError(`${where}.${key}: chaîne non vide attendue`);
  }
  return v;
}

function parsePort(value: unknown, where: string): number {
  const n = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  if (typeof n !== "number" || !Number.isInteger(n) || n < 0 || n > 65535) {
    throw new ConfigError(`${where}: port invalide '${String(value)}' (0..65535)`);
  }
  return n;
}

function parseLevel(value: unknown, where: string): LogLevel {
  const level = typeof value === "string" ? parseLogLevel(value) : null;
  if (!level) {
    throw new ConfigError(`${where}: niveau de log invalide '${String(value)}' (error|warn|info|debug|trace)`);
  }
  return level;
}

/**
 * Valide le document YAML parsé.
 * @throws ConfigError si un type ne correspond pas
 */
export function parseFileConfig(raw: unknown, source = "config"): FileConfig {
  if (raw === null || raw === undefined) return {};
  if (!isRecord(raw)) throw new ConfigError(`${source}: objet YAML attendu`);
  const cfg: FileConfig = {};

  if (raw.midi !== undefined && raw.midi !== null) {
    if (!isRecord(raw.midi)) throw new ConfigError(`${source}.midi: objet attendu`);
    cfg.midi = {
      device: optionalString(raw.midi, "device", `${source}.midi`),
      input: optionalString(raw.midi, "input", `${source}.midi`),
      output: optionalString(raw.midi, "output", `${source}.midi`),
    };
  }

  if (raw.udp !== undefined && raw.udp !== null) {
    if (!isRecord(raw.udp)) throw new ConfigError(`${source}.udp: objet attendu`);
    cfg.udp = {
      host: optionalString(raw.udp, "host", `${source}.udp`),
      port: raw.udp.port === undefined ? undefined : parsePort(raw.udp.port, `${source}.udp.port`),
    };
  }

  if (raw.log_level !== undefined) {
    cfg.log_level = parseLevel(raw.log_level, `${source}.log_level`);
  }
  return cfg;
}

/**
 * Charge et valide le fichier YAML de configuration.
 * @param filePath Chemin explicite; sinon, recherche via {@link findConfigPath}
 * @throws ConfigError si aucun fichier n'est trouvé ou s'il est invalide
 */
export async function loadConfig(filePath?: string): Promise<FileConfig> {
  const p = (await findConfigPath(filePath)) ?? null;
  if (!p) {
    throw new ConfigError("Aucun fichier de configuration trouvé (config.yaml)");
  }
  return readConfigFile(p);
}

async function readConfigFile(p: string): Promise<FileConfig> {
  const raw = await fs.readFile(p, "utf8");
  let doc: unknown;
  try {
    doc = YAML.parse(raw);
  } catch (err) {
    throw new ConfigError(`${p}: YAML invalide`, err);
  }
  return parseFileConfig(doc, p);
}

/**
 * Fusionne ligne de commande > fichier > environnement > défauts.
 * `--midi` (ou `midi.device`) fixe l'entrée et la sortie.
 * @throws ConfigError si un périphérique n'est pas défini
 */
export function resolveConfig(
  file: FileConfig,
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  configPath: string | null = null
): GatewayConfig {
  const input = overrides.midi ?? overrides.midiIn ?? file.midi?.device ?? file.midi?.input;
  const output = overrides.midi ?? overrides.midiOut ?? file.midi?.device ?? file.midi?.output;
  if (!input) throw new ConfigError("Périphérique MIDI IN non défini (--midi-in, --midi ou midi.input)");
  if (!output) throw new ConfigError("Périphérique MIDI OUT non défini (--midi-out, --midi ou midi.output)");

  const port = overrides.port !== undefined ? parsePort(overrides.port, "--port") : file.udp?.port ?? DEFAULT_UDP_PORT;
  const host = overrides.host ?? file.udp?.host ?? DEFAULT_UDP_HOST;

  const logLevel: LogLevel =
    overrides.logLevel !== undefined
      ? parseLevel(overrides.logLevel, "--log-level")
      : file.log_level ?? parseLogLevel(env.LOG_LEVEL) ?? "info";

  return { midi: { input, output }, udp: { host, port }, logLevel, configPath };
}

/**
 * Charge le fichier (explicite, ou par défaut s'il existe) puis applique les options.
 * @throws ConfigError si le fichier explicite est absent ou si la configuration est incomplète
 */
export async function buildGatewayConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): Promise<GatewayConfig> {
  let configPath: string | null = null;
  if (overrides.config) {
    try {
      await fs.access(overrides.config);
    } catch (err) {
      throw new ConfigError(`Fichier de configuration introuvable: ${overrides.config}`, err);
    }
    configPath = overrides.config;
  } else {
    configPath = await findConfigPath();
  }
  const file = configPath ? await loadConfig(configPath) : {};
  return resolveConfig(file, overrides, env, configPath);
}

/**
 * Observe un fichier de configuration YAML et notifie en cas de modification.
 * @param filePath Chemin du fichier à surveiller
 * @param onChange Callback appelée avec la nouvelle configuration
 * @param onError Callback d'erreur facultative (YAML invalide, lecture impossible)
 * @returns Fonction pour arrêter l'observation
 */
export function watchConfig(
  filePath: string,
  onChange: (cfg: FileConfig) => void,
  onError?: (err: unknown) => void
): () => void {
  const watcher = chokidar.watch(filePath, { ignoreInitial: true });
  const handler = async () => {
    try {
      onChange(await readConfigFile(filePath));
    } catch (err) {
      onError?.(err);
    }
  };
  watcher.on("change", handler);
  return () => void watcher.close();
}
