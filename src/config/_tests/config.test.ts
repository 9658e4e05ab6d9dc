import { describe, it, expect } from "vitest";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { buildGatewayConfig, findConfigPath, loadConfig, parseFileConfig, resolveConfig } from "../../config";
import { ConfigError } from "../../errors";

function yaml(contents: string): string {
  return contents.trimStart();
}

async function writeTmp(name: string, contents: string): Promise<string> {
  const tmp = await fs.mkdtemp(path.join(os.tmpdir(), "midipump-config-"));
  const p = path.join(tmp, name);
  await fs.writeFile(p, yaml(contents), "utf8");
  return p;
}

describe("config", () => {
  it("findConfigPath returns the custom path when file exists", async () => {
    const p = await writeTmp("config.yaml", `
midi:
  device: /dev/ttyAMA0
`);
    expect(await findConfigPath(p)).toBe(p);
  });

  it("loadConfig parses YAML and returns structured object", async () => {
    const p = await writeTmp("my-config.yaml", `
midi:
  input: /dev/snd/midiC1D0
  output: /dev/ttyACM0
udp:
  host: 127.0.0.1
  port: 9000
log_level: debug
`);
    const cfg = await loadConfig(p);
    expect(cfg).toEqual({
      midi: { device: undefined, input: "/dev/snd/midiC1D0", output: "/dev/ttyACM0" },
      udp: { host: "127.0.0.1", port: 9000 },
      log_level: "debug",
    });
  });

  it("parseFileConfig rejects wrong types", () => {
    expect(parseFileConfig(null)).toEqual({});
    expect(() => parseFileConfig("text")).toThrow(ConfigError);
    expect(() => parseFileConfig({ midi: "/dev/ttyAMA0" })).toThrow("config.midi: objet attendu");
    expect(() => parseFileConfig({ midi: { device: 3 } })).toThrow("config.midi.device: chaîne non vide attendue");
    expect(() => parseFileConfig({ udp: { port: 1.5 } })).toThrow("config.udp.port: port invalide '1.5' (0..65535)");
    expect(() => parseFileConfig({ log_level: "loud" })).toThrow(ConfigError);
  });

  it("loadConfig reports invalid YAML as ConfigError", async () => {
    const p = await writeTmp("bad.yaml", "midi: [unclosed\n");
    await expect(loadConfig(p)).rejects.toBeInstanceOf(ConfigError);
  });
});

describe("config.resolveConfig", () => {
  it("applies defaults", () => {
    expect(resolveConfig({ midi: { device: "/dev/ttyAMA0" } }, {}, {})).toEqual({
      midi: { input: "/dev/ttyAMA0", output: "/dev/ttyAMA0" },
      udp: { host: "0.0.0.0", port: 12101 },
      logLevel: "info",
      configPath: null,
    });
  });

  it("--midi overrides both directions and the file", () => {
    const cfg = resolveConfig(
      { midi: { input: "/dev/a", output: "/dev/b" } },
      { midi: "/dev/c", midiIn: "/dev/d" },
      {}
    );
    expect(cfg.midi).toEqual({ input: "/dev/c", output: "/dev/c" });
  });

  it("separate flags win over midi.device", () => {
    const cfg = resolveConfig({ midi: { device: "/dev/ttyAMA0" } }, { midiOut: "/dev/ttyACM0" }, {});
    expect(cfg.midi).toEqual({ input: "/dev/ttyAMA0", output: "/dev/ttyACM0" });
  });

  it("requires both devices", () => {
    expect(() => resolveConfig({}, {}, {})).toThrow(ConfigError);
    expect(() => resolveConfig({ midi: { input: "/dev/a" } }, {}, {})).toThrow(
      "Périphérique MIDI OUT non défini (--midi-out, --midi ou midi.output)"
    );
  });

  it("validates the port flag", () => {
    const base = { midi: { device: "/dev/a" } };
    expect(resolveConfig(base, { port: "9000" }, {}).udp.port).toBe(9000);
    expect(resolveConfig({ ...base, udp: { port: 7000 } }, {}, {}).udp.port).toBe(7000);
    expect(() => resolveConfig(base, { port: "70000" }, {})).toThrow("--port: port invalide '70000' (0..65535)");
    expect(() => resolveConfig(base, { port: "abc" }, {})).toThrow(ConfigError);
  });

  it("log level: flag > file > LOG_LEVEL > info", () => {
    const base = { midi: { device: "/dev/a" } };
    expect(resolveConfig(base, {}, { LOG_LEVEL: "trace" }).logLevel).toBe("trace");
    expect(resolveConfig(base, {}, { LOG_LEVEL: "nope" }).logLevel).toBe("info");
    expect(resolveConfig({ ...base, log_level: "warn" }, {}, { LOG_LEVEL: "trace" }).logLevel).toBe("warn");
    expect(resolveConfig({ ...base, log_level: "warn" }, { logLevel: "ERROR" }, {}).logLevel).toBe("error");
    expect(() => resolveConfig(base, { logLevel: "loud" }, {})).toThrow(ConfigError);
  });
});

describe("config.buildGatewayConfig", () => {
  it("loads an explicit config file and applies flags on top", async () => {
    const p = await writeTmp("gw.yaml", `
midi:
  device: /dev/ttyAMA0
udp:
  port: 9000
`);
    const cfg = await buildGatewayConfig({ config: p, port: "9100" }, {});
    expect(cfg).toEqual({
      midi: { input: "/dev/ttyAMA0", output: "/dev/ttyAMA0" },
      udp: { host: "0.0.0.0", port: 9100 },
      logLevel: "info",
      configPath: p,
    });
  });

  it("reports invalid YAML in the explicit config file as ConfigError", async () => {
    const p = await writeTmp("broken.yaml", "midi: [unclosed\n");
    await expect(buildGatewayConfig({ config: p, midi: "/dev/ttyAMA0" }, {})).rejects.toBeInstanceOf(ConfigError);
  });

  it("fails when the explicit config file is missing", async () => {
    await expect(buildGatewayConfig({ config: "/nonexistent/midipump.yaml" }, {})).rejects.toThrow(
      "Fichier de configuration introuvable: /nonexistent/midipump.yaml"
    );
  });
});
