/** Props of models that take no input: call them with `{}`. */
export type EmptyProps = Record<string, never>;

export type Health = {
  status: 'healthy';
  application: string;
  todos_in_memory: number;
  timestamp: string;
};

export type Endpoint = {
  method: string;
  path: string;
  description: string;
};

export type ApiInfo = {
  application: string;
  version: string;
  emissary_url: string | null;
  data_retention_seconds: number;
  endpoints: Endpoint[];
};
