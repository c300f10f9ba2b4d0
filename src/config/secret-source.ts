// config/secret-source.ts
export interface SecretSource {
  name: string;
  get(key: string): Promise<string | undefined>;
}

export class EnvSecretSource implements SecretSource {
  name = 'env';

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async get(key: string) {
    return this.env[key];
  }
}
