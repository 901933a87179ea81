import { loadConfig } from '../config-loader.js';

export function maskSecret(secret: string): string {
  if (secret.length <= 8) return '****';
  return `${secret.slice(0, 4)}...${secret.slice(-4)}`;
}

export function validateCommand(configPath?: string): void {
  try {
    const config = loadConfig(configPath);
    console.log('Configuration is valid!');
    console.log('');
    console.log('Settings:');
    console.log(`  API key:            ${maskSecret(config.notion.apiKey)}`);
    console.log(`  API version:        ${config.notion.apiVersion}`);
    console.log(`  Base URL:           ${config.notion.baseUrl}`);
    console.log(`  Seed database:      ${config.notion.seedDatabaseId}`);
    console.log(`  Module database:    ${config.notion.moduleDatabaseId}`);
    console.log(`  Request timeout:    ${config.notion.timeoutMs ? `${config.notion.timeoutMs}ms` : '(none)'}`);
    console.log(`  Output directory:   ${config.deploy.outputDir}`);
    console.log(`  Run seed command:   ${config.deploy.runCommand ? 'yes' : 'no'} (${config.deploy.commandPolicy})`);
    console.log(`  Properties:         ${Object.values(config.properties).join(', ')}`);
  } catch (err) {
    console.error('Configuration validation failed!');
    if (err instanceof Error) {
      console.error(err.message);
    }
    process.exit(1);
  }
}
