/**
 * Entry point for the Dixer Writer Node.js backend
 */

import 'dotenv/config';
import { DixerStreamService, HTTPServer, isApiKeyConfigured, loadConfig } from './services';

console.log('Dixer Writer Backend starting...');

const config = loadConfig();
const httpServer = new HTTPServer(config, new DixerStreamService(config));

async function main(): Promise<void> {
  try {
    if (!isApiKeyConfigured(config)) {
      console.warn('CEREBRAS_API_KEY is not set; generation requests will be rejected');
    }

    await httpServer.start();
    console.log(`Backend ready, default model ${config.defaultModel}`);

    // Handle graceful shutdown
    const shutdown = async (signal: string): Promise<void> => {
      console.log(`Received ${signal}, shutting down...`);
      await httpServer.stop();
      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));
  } catch (error) {
    console.error('Failed to start backend:', error);
    process.exit(1);
  }
}

void main();

export { httpServer };
