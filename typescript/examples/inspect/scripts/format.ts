import { TidalTypes, describeLayout, elementNames } from "@tidal/core";
import { max, padEnd } from "lodash";

type DecodedStream = TidalTypes.DecodedStream;
type ScalarValue = TidalTypes.ScalarValue;

function formatTimeRange(timestamps: BigUint64Array): string {
  const first = timestamps[0];
  const last = timestamps[timestamps.length - 1];
  if (first == undefined || last == undefined) {
    return "-";
  }
  return `${first}..${last}`;
}

function fieldTypes(stream: DecodedStream): string[] {
  switch (stream.class) {
    case "scalar":
      return stream.layout.fields;
    case "vector": {
      const { scalarType, length } = stream.layout;
      return Array.from({ length }, () => scalarType);
    }
    case "matrix": {
      // matrix labels name rows
      const { scalarType, rows, cols } = stream.layout;
      return Array.from({ length: rows }, () => `${scalarType}[${cols}]`);
    }
  }
}

/**
 * One line per stream (name, id, layout, sample count, time range), optionally followed by one
 * indented line per field or label.
 */
export function summarizeLog(
  log: TidalTypes.DecodedLog,
  { fields = false }: { fields?: boolean } = {},
): string[] {
  const streams = [...log.values()];
  const nameWidth = max(streams.map((stream) => stream.name.length)) ?? 0;
  const lines: string[] = [];
  for (const stream of streams) {
    lines.push(
      [
        padEnd(stream.name, nameWidth),
        `id=${stream.id}`,
        describeLayout(stream.layout),
        `samples=${stream.timestamps.length}`,
        `time=${formatTimeRange(stream.timestamps)}`,
      ].join("  "),
    );
    if (fields) {
      const types = fieldTypes(stream);
      const names =
        stream.class === "scalar"
          ? elementNames(stream.layout, stream.labels)
          : types.map((_, i) => stream.labels?.[i] ?? `[${i}]`);
      const fieldWidth = max(names.map((name) => name.length)) ?? 0;
      names.forEach((name, i) => {
        lines.push(`    ${padEnd(name, fieldWidth)}  ${types[i] ?? ""}`);
      });
    }
  }
  return lines;
}

function csvField(value: string): string {
  return /[",\n\r]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function formatValue(value: ScalarValue): string {
  if (typeof value === "boolean") {
    return value ? "1" : "0";
  }
  return String(value);
}

function sampleValues(stream: DecodedStream, index: number): ScalarValue[] {
  switch (stream.class) {
    case "scalar": {
      const sample = stream.samples[index] ?? {};
      return elementNames(stream.layout, stream.labels).map((key) => sample[key] ?? 0);
    }
    case "vector":
      return Array.from<ScalarValue>(stream.samples[index] ?? []);
    case "matrix":
      return (stream.samples[index] ?? []).flatMap((row) => Array.from<ScalarValue>(row));
  }
}

/** CSV with a `timestamp` column followed by one column per element, rows in sample order. */
export function streamToCsv(stream: DecodedStream): string {
  const header = ["timestamp", ...elementNames(stream.layout, stream.labels)];
  const rows = [header.map(csvField).join(",")];
  stream.timestamps.forEach((timestamp, i) => {
    rows.push([String(timestamp), ...sampleValues(stream, i).map(formatValue)].join(","));
  });
  return rows.join("\n") + "\n";
}
