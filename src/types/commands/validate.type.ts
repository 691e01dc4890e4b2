export type ValidateOptions = {
  schema: string;
  maxRows?: number;
};
