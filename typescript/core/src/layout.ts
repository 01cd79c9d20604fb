import { scalarTypeSize } from "./scalarTypes";
import { Layout, MatrixLayout, ScalarLayout, ScalarType, VectorLayout } from "./types";

export function scalarLayout(fields: ScalarType[]): ScalarLayout {
  return {
    class: "scalar",
    fields,
    byteSize: fields.reduce((total, type) => total + scalarTypeSize(type), 0),
  };
}

export function vectorLayout(scalarType: ScalarType, length: number): VectorLayout {
  return { class: "vector", scalarType, length, byteSize: length * scalarTypeSize(scalarType) };
}

export function matrixLayout(scalarType: ScalarType, rows: number, cols: number): MatrixLayout {
  return {
    class: "matrix",
    scalarType,
    rows,
    cols,
    byteSize: rows * cols * scalarTypeSize(scalarType),
  };
}

/**
 * Number of strings in a label record for this layout. Labels of a matrix name its rows, not its
 * elements; existing logs and readers rely on this.
 */
export function labelCount(layout: Layout): number {
  switch (layout.class) {
    case "scalar":
      return layout.fields.length;
    case "vector":
      return layout.length;
    case "matrix":
      return layout.rows;
  }
}

/** Number of primitive elements in one sample. */
export function elementCount(layout: Layout): number {
  switch (layout.class) {
    case "scalar":
      return layout.fields.length;
    case "vector":
      return layout.length;
    case "matrix":
      return layout.rows * layout.cols;
  }
}

/** Short human readable form, e.g. `scalar(i32, f32)`, `vector<u8>[6]` or `matrix<f64>[3x3]`. */
export function describeLayout(layout: Layout): string {
  switch (layout.class) {
    case "scalar":
      return `scalar(${layout.fields.join(", ")})`;
    case "vector":
      return `vector<${layout.scalarType}>[${layout.length}]`;
    case "matrix":
      return `matrix<${layout.scalarType}>[${layout.rows}x${layout.cols}]`;
  }
}

/**
 * Flat column names for every element of a sample, in row-major order. Labels are used where
 * present; matrix labels name rows, so elements become `label[c]`.
 */
export function elementNames(layout: Layout, labels: readonly string[] | undefined): string[] {
  switch (layout.class) {
    case "scalar":
      return layout.fields.map((_, i) => labels?.[i] ?? String(i));
    case "vector":
      return Array.from({ length: layout.length }, (_, i) => labels?.[i] ?? `[${i}]`);
    case "matrix": {
      const names: string[] = [];
      for (let r = 0; r < layout.rows; r++) {
        const rowName = labels?.[r] ?? `[${r}]`;
        for (let c = 0; c < layout.cols; c++) {
          names.push(`${rowName}[${c}]`);
        }
      }
      return names;
    }
  }
}
