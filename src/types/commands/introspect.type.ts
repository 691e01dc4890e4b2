export type IntrospectOptions = {
  connection: string;
  output?: string;
  rows: number;
};
