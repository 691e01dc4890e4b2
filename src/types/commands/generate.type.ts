export type GenerateOptions = {
  schema: string;
  seed?: number;
  output?: string;
  format: "csv" | "json";
  maxRows?: number;
  dryRun?: boolean;
};
