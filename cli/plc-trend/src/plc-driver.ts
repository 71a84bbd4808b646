import { isAbsolute, resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { ConfigurationError, errorMessage } from "./errors.js";
import { createSimulatedDriver, type SimulatedDriverOptions } from "./sim-driver.js";

// One open maintenance-protocol session. Framing, decoding and timeouts belong
// to the driver. The block reads are optional; callers fall back to single reads.
export interface PlcHandle {
  readFloat(offset: number, swapped: boolean): Promise<number>;
  readWord(offset: number): Promise<number>;
  readBits(offset: number): Promise<boolean | number>;
  readFloatsBlock?(offset: number, count: number, swapped: boolean): Promise<number[]>;
  readWordsBlock?(offset: number, count: number): Promise<number[]>;
  readBitsBlock?(offset: number, count: number): Promise<Array<boolean | number>>;
  close?(): Promise<void> | void;
}

export interface PlcDriver {
  readonly name: string;
  connect(address: string): Promise<PlcHandle>;
}

export type ModuleImporter = (specifier: string) => Promise<unknown>;

const defaultImporter: ModuleImporter = (specifier) => import(specifier);

type Connectable = Pick<PlcDriver, "connect"> & { name?: unknown };

function isConnectable(value: unknown): value is Connectable {
  if (!value || typeof value !== "object") return false;
  return "connect" in value && typeof value.connect === "function";
}

function asDriver(value: Connectable, fallbackName: string): PlcDriver {
  const name = typeof value.name === "string" && value.name ? value.name : fallbackName;
  return { name, connect: (address) => value.connect(address) };
}

function toSpecifier(spec: string): string {
  if (spec.startsWith(".") || isAbsolute(spec)) return pathToFileURL(resolve(spec)).href;
  return spec;
}

async function fromExport(candidate: unknown, fallbackName: string): Promise<PlcDriver | null> {
  if (isConnectable(candidate)) return asDriver(candidate, fallbackName);
  if (typeof candidate === "function") {
    let made: unknown;
    try {
      made = await candidate();
    } catch (err) {
      throw new ConfigurationError(`PLC driver "${fallbackName}" factory failed: ${errorMessage(err)}`);
    }
    if (isConnectable(made)) return asDriver(made, fallbackName);
  }
  return null;
}

/**
 * `sim` is built in; anything else is a locally installed module specifier or
 * file path exporting `createDriver()` or a default driver.
 */
export async function loadDriver(
  spec: string,
  importer: ModuleImporter = defaultImporter,
  sim: SimulatedDriverOptions = {},
): Promise<PlcDriver> {
  const name = spec.trim();
  if (!name) throw new ConfigurationError("no PLC driver configured");
  if (name === "sim") return createSimulatedDriver(sim);

  let mod: unknown;
  try {
    mod = await importer(toSpecifier(name));
  } catch (err) {
    throw new ConfigurationError(`PLC driver "${name}" is not available: ${errorMessage(err)}`);
  }
  if (!mod || typeof mod !== "object") throw new ConfigurationError(`PLC driver "${name}" did not load as a module`);

  const candidates: unknown[] = [];
  if ("createDriver" in mod) candidates.push(mod.createDriver);
  if ("default" in mod) candidates.push(mod.default);
  for (const candidate of candidates) {
    const driver = await fromExport(candidate, name);
    if (driver) return driver;
  }
  throw new ConfigurationError(`PLC driver "${name}" exports neither createDriver() nor a default driver with connect()`);
}
