import { Command } from "commander";
import type { ConfigOverrides } from "../config";
import { DEFAULT_UDP_PORT } from "../midi/constants";

/**
 * Construit le parseur de la ligne de commande.
 * Les valeurs sont validées ensuite par `resolveConfig` (ConfigError).
 */
export function createProgram(): Command {
  return new Command()
    .name("midipump")
    .description("Passerelle UDP → MIDI série: écrit les commandes /midi reçues sur l'instrument")
    .option("--midi <path>", "Périphérique MIDI en entrée et en sortie (ex: /dev/ttyAMA0)")
    .option("--midi-in <path>", "Périphérique MIDI IN (ex: /dev/snd/midiC1D0)")
    .option("--midi-out <path>", "Périphérique MIDI OUT")
    .option("--host <address>", "Adresse d'écoute UDP (défaut: 0.0.0.0)")
    .option("-p, --port <number>", `Port UDP (défaut: ${DEFAULT_UDP_PORT})`)
    .option("--log-level <level>", "error | warn | info | debug | trace")
    .option("-c, --config <path>", "Fichier YAML (défaut: config.yaml ou config/config.yaml s'il existe)");
}

/**
 * Parse les arguments (sans le binaire node ni le script).
 */
export function parseArgs(args: string[]): ConfigOverrides {
  const program = createProgram().exitOverride();
  program.parse(args, { from: "user" });
  return program.opts<ConfigOverrides>();
}
