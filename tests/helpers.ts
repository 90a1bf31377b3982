import { compileSource, parseSource } from "../src/driver.js";
import type { Program } from "../src/types/index.js";

/** The tree without source positions, for structural comparison */
export const withoutPositions = (value: unknown): unknown =>
  JSON.parse(JSON.stringify(value, (key, inner: unknown) => (key === "position" ? undefined : inner)));

export const parse = (source: string): Program => parseSource(source);

export const instantiate = (
  source: string,
  imports: WebAssembly.Imports = {}
): WebAssembly.Instance => {
  const { module } = compileSource(source);
  const binary = new Uint8Array(module.emitBinary());
  module.dispose();
  return new WebAssembly.Instance(new WebAssembly.Module(binary), imports);
};

export const exported = (instance: WebAssembly.Instance, name: string) => {
  const value = instance.exports[name];
  if (typeof value !== "function") throw new Error(`${name} is not an exported function`);
  return (...args: unknown[]): unknown => value(...args);
};

export const readString = (instance: WebAssembly.Instance, address: number): string => {
  const memory = instance.exports.memory;
  if (!(memory instanceof WebAssembly.Memory)) throw new Error("memory is not exported");
  const bytes = new Uint8Array(memory.buffer);
  const end = bytes.indexOf(0, address);
  return new TextDecoder().decode(bytes.subarray(address, end));
};
