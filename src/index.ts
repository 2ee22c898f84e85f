#!/usr/bin/env node

/**
 * Gemini Persona Chat - Entry Point
 */

import { getConfig, printConfigInfo } from './config.js';
import { ChatServer } from './presentation/ChatServer.js';

async function main() {
  let chatServer: ChatServer | null = null;

  try {
    const config = getConfig();
    printConfigInfo(config);

    chatServer = new ChatServer(config);
    await chatServer.start();

    const shutdown = async (signal: string) => {
      console.error(`\n\n📛 Received ${signal}, shutting down gracefully...`);
      if (chatServer) {
        await chatServer.shutdown();
      }
      console.error('👋 Goodbye!\n');
      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));

    process.on('uncaughtException', (error) => {
      console.error('💥 Uncaught Exception:', error);
      void shutdown('UNCAUGHT_EXCEPTION');
    });

    process.on('unhandledRejection', (reason) => {
      console.error('💥 Unhandled Rejection:', reason);
      void shutdown('UNHANDLED_REJECTION');
    });
  } catch (error) {
    console.error('💥 Fatal error in main():', error);

    if (chatServer) {
      await chatServer.shutdown();
    }

    process.exit(1);
  }
}

void main();
