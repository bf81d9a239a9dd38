export function requireEnv(key: string): string {
  const value = process.env[key]?.trim();
  if (value === undefined || value === "") {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

export function optionalEnv(key: string, fallback?: string): string | undefined {
  const trimmed = process.env[key]?.trim();
  return trimmed ? trimmed : fallback;
}

export type AzureOpenAiEnv = {
  apiKey: string;
  endpoint: string;
  apiVersion: string;
  deployment: string;
};

export const DEFAULT_AZURE_API_VERSION = "2024-12-01-preview";
export const DEFAULT_AZURE_DEPLOYMENT = "gpt-4o";

export function readAzureOpenAiEnv(): AzureOpenAiEnv {
  return {
    apiKey: requireEnv("AZURE_OPENAI_API_KEY"),
    endpoint: requireEnv("AZURE_OPENAI_ENDPOINT"),
    apiVersion: optionalEnv("AZURE_OPENAI_API_VERSION", DEFAULT_AZURE_API_VERSION) ?? DEFAULT_AZURE_API_VERSION,
    deployment: optionalEnv("AZURE_OPENAI_DEPLOYMENT", DEFAULT_AZURE_DEPLOYMENT) ?? DEFAULT_AZURE_DEPLOYMENT,
  };
}
