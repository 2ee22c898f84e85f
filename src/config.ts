import * as dotenv from 'dotenv';
import { z } from 'zod';
import { API_KEY_ENV } from './core/constants.js';

// Load environment variables from .env file
dotenv.config();

export interface Config {
  server: {
    name: string;
    version: string;
    debug: boolean;
  };
  gemini: {
    textModel: string;
    multimodalModel: string;
    timeoutMs: number;
    retryAttempts: number;
  };
  speech: {
    enabled: boolean;
    model: string;
    voice: string;
  };
  webUI: {
    enabled: boolean;
    port: number;
  };
  mcp: {
    enabled: boolean;
  };
}

// Zod validation schema
const ConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    debug: z.boolean(),
  }),
  gemini: z.object({
    textModel: z.string().min(1, 'Text model must not be empty'),
    multimodalModel: z.string().min(1, 'Multimodal model must not be empty'),
    timeoutMs: z.number().int().min(1000).max(600000),
    retryAttempts: z.number().int().min(1).max(5),
  }),
  speech: z.object({
    enabled: z.boolean(),
    model: z.string().min(1, 'Speech model must not be empty'),
    voice: z.string().min(1, 'Speech voice must not be empty'),
  }),
  webUI: z.object({
    enabled: z.boolean(),
    port: z.number().int().min(1024).max(65535),
  }),
  mcp: z.object({
    enabled: z.boolean(),
  }),
});

/**
 * Parse command line arguments
 * Usage: node dist/index.js --web-port 8501 --text-model gemini-flash-latest --speech --debug
 */
export function parseArgs(argv: string[] = process.argv): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);

      // Check if next arg is a value or another flag
      if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        args[key] = argv[++i];
      } else {
        args[key] = true;
      }
    }
  }

  return args;
}

/**
 * Build the configuration from CLI arguments, then environment, then defaults.
 * Throws a ZodError when the assembled values are invalid.
 */
export function loadConfig(
  cliArgs: Record<string, string | boolean> = parseArgs(),
  env: NodeJS.ProcessEnv = process.env
): Config {
  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || defaultValue;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    if (cliArgs[cliKey] !== undefined) return cliArgs[cliKey] === true || cliArgs[cliKey] === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : (envValue === 'false' ? false : defaultValue);
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return parseInt(cliValue, 10);
    const envValue = env[envKey];
    return envValue ? parseInt(envValue, 10) : defaultValue;
  };

  const rawConfig = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'gemini-persona-chat'),
      version: getString('server-version', 'SERVER_VERSION', '1.0.0'),
      debug: getBoolean('debug', 'DEBUG', false),
    },
    gemini: {
      textModel: getString('text-model', 'GEMINI_TEXT_MODEL', 'gemini-flash-latest'),
      multimodalModel: getString('multimodal-model', 'GEMINI_MULTIMODAL_MODEL', 'gemini-2.0-flash'),
      timeoutMs: getNumber('timeout', 'GEMINI_TIMEOUT_MS', 60000),
      retryAttempts: getNumber('retry-attempts', 'GEMINI_RETRY_ATTEMPTS', 2),
    },
    speech: {
      enabled: getBoolean('speech', 'SPEECH_ENABLED', false),
      model: getString('speech-model', 'SPEECH_MODEL', 'gemini-2.5-flash-preview-tts'),
      voice: getString('speech-voice', 'SPEECH_VOICE', 'Kore'),
    },
    webUI: {
      enabled: getBoolean('web-ui', 'WEB_UI_ENABLED', true),
      port: getNumber('web-port', 'WEB_PORT', 8501),
    },
    mcp: {
      enabled: getBoolean('mcp', 'MCP_ENABLED', false),
    },
  };

  return ConfigSchema.parse(rawConfig);
}

/**
 * Get configuration from environment variables or CLI arguments.
 * Prints every validation problem and exits when the configuration is invalid.
 */
export function getConfig(): Config {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('\n❌ Configuration Validation Failed!\n');
      console.error('Errors:');
      error.errors.forEach(err => {
        const path = err.path.join('.');
        console.error(`  • ${path || 'root'}: ${err.message}`);
      });
      console.error('\n💡 Tips:');
      console.error('  - Check your .env file');
      console.error('  - Verify CLI arguments');
      console.error('  - Ports must be between 1024 and 65535');
      console.error();
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Print configuration summary
 */
export function printConfigInfo(config: Config): void {
  console.error('╔══════════════════════════════════════════════════════════════════╗');
  console.error('║             Gemini Persona Chat - Configuration                 ║');
  console.error('╚══════════════════════════════════════════════════════════════════╝');

  console.error(`\n📊 Server: ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`);
  console.error(`🤖 Models: text=${config.gemini.textModel} | multimodal=${config.gemini.multimodalModel}`);
  console.error(`⏱️  Timeout: ${config.gemini.timeoutMs}ms | Attempts: ${config.gemini.retryAttempts}`);
  console.error(`🔑 ${API_KEY_ENV}: ${process.env[API_KEY_ENV] ? 'set' : 'missing (requests will fail until it is set)'}`);
  console.error(`🔊 Speech: ${config.speech.enabled ? `${config.speech.model} (${config.speech.voice})` : 'disabled'}`);

  if (config.webUI.enabled) {
    console.error(`\n🌐 Web UI: http://localhost:${config.webUI.port}`);
  }

  if (config.mcp.enabled) {
    console.error(`📡 MCP: STDIO mode`);
  }

  console.error('\n' + '─'.repeat(68));
}
