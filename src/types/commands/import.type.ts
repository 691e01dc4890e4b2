export type ImportSource = "ddl" | "openapi";

export type ImportOptions = {
  from?: ImportSource;
  output?: string;
  rows: number;
};
