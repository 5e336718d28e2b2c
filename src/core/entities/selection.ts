/**
 * Time-window policy applied to a company's filing list. Exactly one is active per download.
 */
export type SelectionPolicy =
  | { kind: "all" }
  | { kind: "year"; year: number; quarter?: number }
  | { kind: "rolling"; years: number };

export type SelectionOptions = {
  year?: number;
  quarter?: number;
  all?: boolean;
};
