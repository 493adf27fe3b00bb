export type AppConfig = {
  nodeEnv: string;
  name: string;
  port: number;
  apiPrefix: string;
  serviceApiKey: string;
  swaggerEnabled: boolean;
};
