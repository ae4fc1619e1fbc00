import dotenv from 'dotenv';
import { AspectRatioLabel, DEFAULT_ASPECT_RATIO, isAspectRatioLabel } from '../domain/entities/AspectRatio';
import {
    MAX_SAFETY_TOLERANCE,
    MIN_SAFETY_TOLERANCE,
    OutputFormat,
    isOutputFormat,
} from '../domain/entities/EditRequest';
import { DEFAULT_MAX_CONVERSATIONS } from '../application/ConversationContext';
import { DEFAULT_FLUX_KONTEXT_URL } from '../infrastructure/images/FluxKontextEditClient';

// Load environment variables
dotenv.config();

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    // Server
    port: number;
    environment: string;

    // Telegram
    telegramBotToken: string;
    telegramWebhookSecret: string;

    // Black Forest Labs (FLUX Kontext editing)
    bflApiKey: string;
    bflApiUrl: string;
    bflMaxPolls: number;
    bflPollIntervalSeconds: number;
    bflRequestTimeoutSeconds: number;

    // Image handling
    maxImageSizeMb: number;
    /** Chats whose photo is kept in memory at once */
    maxConversations: number;
    defaultAspectRatio: AspectRatioLabel;
    outputFormat: OutputFormat;
    safetyTolerance: number;
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

function getEnvVarChoice<T extends string>(
    key: string,
    isAllowed: (value: string) => value is T,
    defaultValue: T
): T {
    const value = getEnvVar(key, defaultValue);
    if (!isAllowed(value)) {
        throw new Error(`Environment variable ${key} has unsupported value: ${value}`);
    }
    return value;
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    return {
        // Server
        port: getEnvVarNumber('PORT', 3000),
        environment: getEnvVar('NODE_ENV', 'development'),

        // Telegram
        telegramBotToken: getEnvVar('TELEGRAM_BOT_TOKEN', ''),
        telegramWebhookSecret: getEnvVar('TELEGRAM_WEBHOOK_SECRET', ''),

        // Black Forest Labs
        bflApiKey: getEnvVar('BFL_API_KEY', ''),
        bflApiUrl: getEnvVar('BFL_API_URL', DEFAULT_FLUX_KONTEXT_URL),
        bflMaxPolls: getEnvVarNumber('BFL_MAX_POLLS', 60),
        bflPollIntervalSeconds: getEnvVarNumber('BFL_POLL_INTERVAL', 2),
        bflRequestTimeoutSeconds: getEnvVarNumber('BFL_REQUEST_TIMEOUT', 30),

        // Image handling
        maxImageSizeMb: getEnvVarNumber('MAX_IMAGE_SIZE_MB', 20),
        maxConversations: getEnvVarNumber('MAX_CONVERSATIONS', DEFAULT_MAX_CONVERSATIONS),
        defaultAspectRatio: getEnvVarChoice('DEFAULT_ASPECT_RATIO', isAspectRatioLabel, DEFAULT_ASPECT_RATIO),
        outputFormat: getEnvVarChoice('OUTPUT_FORMAT', isOutputFormat, 'jpeg'),
        safetyTolerance: getEnvVarNumber('SAFETY_TOLERANCE', 2),
    };
}

/**
 * Validates that required credentials are present and tunables are in range.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!config.telegramBotToken) {
        errors.push('TELEGRAM_BOT_TOKEN environment variable is required');
    }
    if (!config.bflApiKey) {
        errors.push('BFL_API_KEY environment variable is required');
    }
    if (!Number.isInteger(config.bflMaxPolls) || config.bflMaxPolls < 1) {
        errors.push(`BFL_MAX_POLLS must be a positive integer, got: ${config.bflMaxPolls}`);
    }
    if (config.bflPollIntervalSeconds <= 0) {
        errors.push(`BFL_POLL_INTERVAL must be greater than 0, got: ${config.bflPollIntervalSeconds}`);
    }
    if (config.bflRequestTimeoutSeconds <= 0) {
        errors.push(`BFL_REQUEST_TIMEOUT must be greater than 0, got: ${config.bflRequestTimeoutSeconds}`);
    }
    if (config.maxImageSizeMb <= 0) {
        errors.push(`MAX_IMAGE_SIZE_MB must be greater than 0, got: ${config.maxImageSizeMb}`);
    }
    if (!Number.isInteger(config.maxConversations) || config.maxConversations < 1) {
        errors.push(`MAX_CONVERSATIONS must be a positive integer, got: ${config.maxConversations}`);
    }
    if (
        !Number.isInteger(config.safetyTolerance) ||
        config.safetyTolerance < MIN_SAFETY_TOLERANCE ||
        config.safetyTolerance > MAX_SAFETY_TOLERANCE
    ) {
        errors.push(`SAFETY_TOLERANCE must be an integer between ${MIN_SAFETY_TOLERANCE} and ${MAX_SAFETY_TOLERANCE}, got: ${config.safetyTolerance}`);
    }

    return errors;
}

/** Worst-case time spent polling one job, in seconds. */
export function getPollBudgetSeconds(config: Config): number {
    return config.bflMaxPolls * config.bflPollIntervalSeconds;
}
