import type { JsonValue } from "../core/types.js";

export interface SerializeJsonOptions {
  indent: string;
  sortKeys: boolean;
}

const compareKeys = (a: string, b: string): number => {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
};

const encodeString = (value: string): string => JSON.stringify(value);

const writeValue = (value: JsonValue, options: SerializeJsonOptions, depth: number): string => {
  switch (value.kind) {
    case "null":
      return "null";
    case "boolean":
      return value.value ? "true" : "false";
    case "number":
      return value.raw;
    case "string":
      return encodeString(value.value);
    case "array": {
      if (value.items.length === 0) {
        return "[]";
      }
      const inner = `\n${options.indent.repeat(depth + 1)}`;
      const items = value.items.map((item) => writeValue(item, options, depth + 1));
      return `[${inner}${items.join(`,${inner}`)}\n${options.indent.repeat(depth)}]`;
    }
    case "object": {
      if (value.entries.size === 0) {
        return "{}";
      }
      const entries = [...value.entries];
      if (options.sortKeys) {
        entries.sort(([a], [b]) => compareKeys(a, b));
      }
      const inner = `\n${options.indent.repeat(depth + 1)}`;
      const members = entries.map(
        ([key, member]) => `${encodeString(key)}: ${writeValue(member, options, depth + 1)}`
      );
      return `{${inner}${members.join(`,${inner}`)}\n${options.indent.repeat(depth)}}`;
    }
  }
};

export const serializeJson = (value: JsonValue, options: SerializeJsonOptions): string =>
  writeValue(value, options, 0);
