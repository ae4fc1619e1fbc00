import { Router, Request, Response, NextFunction } from 'express';
import { Config } from '../../config';
import { ConversationContext, ConversationContextStore } from '../../application/ConversationContext';
import { PhotoEditService } from '../../application/PhotoEditService';
import { asyncHandler, BadRequestError, UnauthorizedError } from '../middleware/errorHandler';
import { ChatService } from '../services/ChatService';
import {
    EDIT_FAILED_MESSAGE,
    PHOTO_REQUIRED_MESSAGE,
    UNEXPECTED_ERROR_MESSAGE,
    formatEditInProgress,
    formatEditedCaption,
    formatHelpMessage,
    formatImageTooLarge,
    formatPhotoReceived,
    formatStatusMessage,
    formatWelcomeMessage,
} from '../formatters/MessageFormatter';

export interface TelegramBotDependencies {
    config: Config;
    chatService: ChatService;
    photoEditService: PhotoEditService;
    contexts: ConversationContextStore;
}

/**
 * Middleware to validate Telegram webhook secret token.
 */
export function validateTelegramSecret(secretToken: string) {
    return (req: Request, res: Response, next: NextFunction) => {
        if (!secretToken) {
            // No secret configured (local development)
            return next();
        }

        const receivedToken = req.headers['x-telegram-bot-api-secret-token'];

        if (receivedToken !== secretToken) {
            console.warn('[Telegram] Invalid webhook secret token received');
            throw new UnauthorizedError('Invalid webhook secret');
        }

        next();
    };
}

/**
 * Creates Telegram webhook routes.
 */
export function createTelegramWebhookRoutes(deps: TelegramBotDependencies): Router {
    const router = Router();

    /**
     * POST /telegram-webhook
     *
     * Receives Telegram updates. Editing can take up to the full poll budget,
     * longer than Telegram waits for a webhook reply, so the update is
     * acknowledged before it is processed.
     */
    router.post(
        '/telegram-webhook',
        validateTelegramSecret(deps.config.telegramWebhookSecret),
        asyncHandler(async (req: Request, res: Response) => {
            const update: TelegramUpdate = req.body;
            if (typeof update?.update_id !== 'number') {
                throw new BadRequestError('Invalid Telegram update');
            }

            res.status(200).json({ ok: true });

            try {
                await handleTelegramUpdate(update, deps);
            } catch (error) {
                console.error('[Telegram] Webhook processing error:', error);
            }
        })
    );

    return router;
}

/**
 * Processes one Telegram update: commands, photos, and edit instructions.
 */
export async function handleTelegramUpdate(update: TelegramUpdate, deps: TelegramBotDependencies): Promise<void> {
    const message = update.message;
    if (!message) {
        return;
    }

    const chatId = message.chat.id;
    const context = deps.contexts.forChat(chatId);

    // PHOTO PATH
    if (message.photo) {
        await handlePhoto(message, context, deps);
        return;
    }

    const text = message.text?.trim();
    if (!text) {
        console.log(`[Telegram] Ignoring unsupported message type from chat ${chatId}`);
        return;
    }

    // COMMANDS
    if (text.startsWith('/')) {
        await handleCommand(text, message, context, deps);
        return;
    }

    // EDIT INSTRUCTION PATH
    if (!context.has('photo')) {
        await deps.chatService.sendMessage(chatId, PHOTO_REQUIRED_MESSAGE);
        return;
    }

    console.log(`[Telegram] Edit instruction from chat ${chatId}: "${text.substring(0, 50)}"`);
    const progressMessageId = await deps.chatService.sendMessage(chatId, '🎨 Processing your edit request...');
    await runEdit(chatId, text, progressMessageId, context, deps);
}

async function handleCommand(
    text: string,
    message: TelegramMessage,
    context: ConversationContext,
    deps: TelegramBotDependencies
): Promise<void> {
    const chatId = message.chat.id;
    // "/start@MyBot extra" -> "/start"
    const command = text.split(/\s+/)[0].split('@')[0].toLowerCase();

    switch (command) {
        case '/start':
            await deps.chatService.sendMessage(chatId, formatWelcomeMessage(message.from?.first_name ?? 'there'));
            return;
        case '/help':
            await deps.chatService.sendMessage(chatId, formatHelpMessage());
            return;
        case '/status':
            await deps.chatService.sendMessage(chatId, formatStatusMessage(deps.config));
            return;
        case '/clear':
            if (context.has('photo')) {
                deps.contexts.release(chatId);
                await deps.chatService.sendMessage(chatId, '✅ Image cleared! Send a new image to start editing.');
            } else {
                await deps.chatService.sendMessage(chatId, 'No image to clear. Send an image first!');
            }
            return;
        default:
            console.log(`[Telegram] Ignoring unknown command ${command} from chat ${chatId}`);
    }
}

async function handlePhoto(
    message: TelegramMessage,
    context: ConversationContext,
    deps: TelegramBotDependencies
): Promise<void> {
    const chatId = message.chat.id;
    const { chatService, photoEditService, config } = deps;

    // Telegram lists sizes smallest first
    const sizes = message.photo ?? [];
    const largest = sizes[sizes.length - 1];
    if (!largest) {
        await chatService.sendMessage(chatId, '❌ Please send a photo.');
        return;
    }

    const progressMessageId = await chatService.sendMessage(chatId, '📥 Processing your image...');
    const progress = (text: string) => updateProgress(chatService, chatId, progressMessageId, text);

    try {
        const photo = await chatService.downloadFile(largest.file_id);
        const stashed = photoEditService.stashPhoto(context, photo);
        if (!stashed.ok) {
            await progress(formatImageTooLarge(config.maxImageSizeMb));
            return;
        }

        const caption = message.caption?.trim();
        if (!caption) {
            await progress(formatPhotoReceived(stashed.aspectRatio));
            return;
        }

        await progress(
            `✅ Image received with caption!\n📐 Aspect ratio: ${stashed.aspectRatio}\n📝 Prompt: "${caption}"\n\n🎨 Starting edit...`
        );
        await runEdit(chatId, caption, progressMessageId, context, deps);
    } catch (error) {
        console.error(`[Telegram] Error handling photo from chat ${chatId}:`, error);
        await chatService.sendMessage(chatId, '❌ Error processing image. Please try again.');
    }
}

async function runEdit(
    chatId: number,
    prompt: string,
    progressMessageId: number | undefined,
    context: ConversationContext,
    deps: TelegramBotDependencies
): Promise<void> {
    const { chatService, photoEditService, config } = deps;
    const progress = (text: string) => updateProgress(chatService, chatId, progressMessageId, text);

    try {
        await progress(formatEditInProgress(prompt, context.get('aspectRatio') ?? config.defaultAspectRatio));

        const edited = await photoEditService.applyInstruction(context, prompt);
        if (!edited) {
            await progress(EDIT_FAILED_MESSAGE);
            return;
        }

        await chatService.sendPhoto(chatId, edited, formatEditedCaption(prompt), config.outputFormat);
        if (progressMessageId !== undefined) {
            await chatService.deleteMessage(chatId, progressMessageId);
        }
        await chatService.sendMessage(
            chatId,
            '🔄 You can send another editing instruction for this image, or send a new image to start over!'
        );
    } catch (error) {
        console.error(`[Telegram] Error processing edit for chat ${chatId}:`, error);
        await progress(UNEXPECTED_ERROR_MESSAGE);
    }
}

/**
 * Edits the progress message in place, or sends a new one if the original send failed.
 */
async function updateProgress(
    chatService: ChatService,
    chatId: number,
    messageId: number | undefined,
    text: string
): Promise<void> {
    if (messageId === undefined) {
        await chatService.sendMessage(chatId, text);
        return;
    }
    await chatService.editMessageText(chatId, messageId, text);
}

/**
 * Telegram update types (minimal definitions).
 */
export interface TelegramUpdate {
    update_id: number;
    message?: TelegramMessage;
}

export interface TelegramMessage {
    message_id: number;
    chat: {
        id: number;
        type?: string;
    };
    from?: {
        id: number;
        first_name: string;
        username?: string;
    };
    text?: string;
    caption?: string;
    photo?: TelegramPhotoSize[];
}

interface TelegramPhotoSize {
    file_id: string;
    width: number;
    height: number;
    file_size?: number;
}
