import express, { Application, Request, Response } from 'express';
import { Config } from '../config';
import { ConversationContextStore } from '../application/ConversationContext';
import { PhotoEditService } from '../application/PhotoEditService';
import { FluxKontextEditClient } from '../infrastructure/images/FluxKontextEditClient';
import { ImageSizeInspector } from '../infrastructure/images/ImageSizeInspector';
import { ChatService } from './services/ChatService';
import { createTelegramWebhookRoutes, TelegramBotDependencies } from './routes/telegramWebhook';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';

/**
 * Creates and configures the Express application.
 */
export function createApp(config: Config, deps: TelegramBotDependencies = createDependencies(config)): Application {
    const app = express();

    // Telegram sends photos by file_id, so update bodies stay small
    app.use(express.json({ limit: '1mb' }));

    // Health check
    app.get('/health', (req: Request, res: Response) => {
        res.json({
            status: 'ok',
            timestamp: new Date().toISOString(),
            version: '1.0.0',
        });
    });

    app.use(createTelegramWebhookRoutes(deps));

    app.use(notFoundHandler);
    // Error handler (must be last)
    app.use(errorHandler);

    return app;
}

/**
 * Creates all dependencies with proper wiring.
 */
export function createDependencies(config: Config): TelegramBotDependencies {
    const editClient = new FluxKontextEditClient(config.bflApiKey, {
        apiUrl: config.bflApiUrl,
        maxPolls: config.bflMaxPolls,
        pollIntervalMs: config.bflPollIntervalSeconds * 1000,
        requestTimeoutMs: config.bflRequestTimeoutSeconds * 1000,
    });
    console.log(`✅ Image editing: FLUX Kontext (${config.bflMaxPolls} polls x ${config.bflPollIntervalSeconds}s)`);

    const photoEditService = new PhotoEditService(editClient, new ImageSizeInspector(), {
        maxImageSizeMb: config.maxImageSizeMb,
        defaultAspectRatio: config.defaultAspectRatio,
        outputFormat: config.outputFormat,
        safetyTolerance: config.safetyTolerance,
    });

    return {
        config,
        chatService: new ChatService(config.telegramBotToken),
        photoEditService,
        contexts: new ConversationContextStore(config.maxConversations),
    };
}
