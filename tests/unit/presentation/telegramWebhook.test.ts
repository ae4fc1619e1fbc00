import { handleTelegramUpdate, TelegramBotDependencies, TelegramMessage } from '../../../src/presentation/routes/telegramWebhook';
import { Config } from '../../../src/config';
import { ConversationContextStore } from '../../../src/application/ConversationContext';
import { PhotoEditService } from '../../../src/application/PhotoEditService';
import { IImageEditClient } from '../../../src/domain/ports/IImageEditClient';
import { JobTimedOutError } from '../../../src/domain/errors/ImageEditError';
import { ChatService } from '../../../src/presentation/services/ChatService';
import {
    EDIT_FAILED_MESSAGE,
    PHOTO_REQUIRED_MESSAGE,
    UNEXPECTED_ERROR_MESSAGE,
    formatEditInProgress,
    formatEditedCaption,
    formatHelpMessage,
    formatImageTooLarge,
    formatPhotoReceived,
    formatWelcomeMessage,
} from '../../../src/presentation/formatters/MessageFormatter';

const CHAT_ID = 4242;
const PROGRESS_ID = 10;
const NEXT_STEP_MESSAGE = '🔄 You can send another editing instruction for this image, or send a new image to start over!';

const config: Config = {
    port: 3000,
    environment: 'test',
    telegramBotToken: 'test-bot-token',
    telegramWebhookSecret: 'test-secret',
    bflApiKey: 'test-api-key',
    bflApiUrl: 'https://api.bfl.test/v1/flux-kontext-pro',
    bflMaxPolls: 60,
    bflPollIntervalSeconds: 2,
    bflRequestTimeoutSeconds: 30,
    maxImageSizeMb: 1,
    maxConversations: 1000,
    defaultAspectRatio: '1:1',
    outputFormat: 'jpeg',
    safetyTolerance: 2,
};

function textMessage(text: string): TelegramMessage {
    return {
        message_id: 1,
        chat: { id: CHAT_ID, type: 'private' },
        from: { id: 7, first_name: 'Ada' },
        text,
    };
}

function photoMessage(caption?: string): TelegramMessage {
    return {
        message_id: 2,
        chat: { id: CHAT_ID, type: 'private' },
        caption,
        photo: [
            { file_id: 'small-file', width: 90, height: 51 },
            { file_id: 'large-file', width: 1280, height: 720 },
        ],
    };
}

describe('Telegram update handling', () => {
    let chatService: ChatService;
    let editClient: jest.Mocked<IImageEditClient>;
    let deps: TelegramBotDependencies;

    let sendMessage: jest.SpyInstance;
    let editMessageText: jest.SpyInstance;
    let deleteMessage: jest.SpyInstance;
    let downloadFile: jest.SpyInstance;
    let sendPhoto: jest.SpyInstance;

    const handle = (message: TelegramMessage) => handleTelegramUpdate({ update_id: 1, message }, deps);

    beforeEach(() => {
        chatService = new ChatService('test-bot-token');
        sendMessage = jest.spyOn(chatService, 'sendMessage').mockResolvedValue(PROGRESS_ID);
        editMessageText = jest.spyOn(chatService, 'editMessageText').mockResolvedValue(undefined);
        deleteMessage = jest.spyOn(chatService, 'deleteMessage').mockResolvedValue(undefined);
        downloadFile = jest.spyOn(chatService, 'downloadFile').mockResolvedValue(Buffer.from('photo'));
        sendPhoto = jest.spyOn(chatService, 'sendPhoto').mockResolvedValue(undefined);

        editClient = { editImage: jest.fn().mockResolvedValue(Buffer.from('edited')) };
        const inspector = { getDimensions: jest.fn().mockReturnValue({ width: 1280, height: 720 }) };

        deps = {
            config,
            chatService,
            photoEditService: new PhotoEditService(editClient, inspector, {
                maxImageSizeMb: config.maxImageSizeMb,
                defaultAspectRatio: config.defaultAspectRatio,
                outputFormat: config.outputFormat,
                safetyTolerance: config.safetyTolerance,
            }),
            contexts: new ConversationContextStore(),
        };

        jest.spyOn(console, 'log').mockImplementation(() => { });
        jest.spyOn(console, 'warn').mockImplementation(() => { });
        jest.spyOn(console, 'error').mockImplementation(() => { });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('commands', () => {
        it('should greet the user on /start', async () => {
            await handle(textMessage('/start'));

            expect(sendMessage).toHaveBeenCalledWith(CHAT_ID, formatWelcomeMessage('Ada'));
        });

        it('should accept commands addressed to the bot by name', async () => {
            await handle(textMessage('/help@PhotoEditBot'));

            expect(sendMessage).toHaveBeenCalledWith(CHAT_ID, formatHelpMessage());
        });

        it('should report the poll budget on /status', async () => {
            await handle(textMessage('/status'));

            expect(sendMessage).toHaveBeenCalledWith(CHAT_ID, expect.stringContaining('⏱️ Edit timeout: 120s'));
        });

        it('should clear a stashed photo on /clear', async () => {
            deps.contexts.forChat(CHAT_ID).set('photo', Buffer.from('photo'));

            await handle(textMessage('/clear'));

            expect(deps.contexts.size).toBe(0);
            expect(deps.contexts.forChat(CHAT_ID).has('photo')).toBe(false);
            expect(sendMessage).toHaveBeenCalledWith(CHAT_ID, '✅ Image cleared! Send a new image to start editing.');
        });

        it('should tell the user when there is nothing to clear', async () => {
            await handle(textMessage('/clear'));

            expect(sendMessage).toHaveBeenCalledWith(CHAT_ID, 'No image to clear. Send an image first!');
        });

        it('should ignore unknown commands', async () => {
            await handle(textMessage('/settings'));

            expect(sendMessage).not.toHaveBeenCalled();
        });
    });

    describe('photos', () => {
        it('should stash the largest size and ask for instructions', async () => {
            await handle(photoMessage());

            expect(downloadFile).toHaveBeenCalledWith('large-file');
            expect(sendMessage).toHaveBeenCalledWith(CHAT_ID, '📥 Processing your image...');
            expect(editMessageText).toHaveBeenCalledWith(CHAT_ID, PROGRESS_ID, formatPhotoReceived('16:9'));
            expect(deps.contexts.forChat(CHAT_ID).get('aspectRatio')).toBe('16:9');
            expect(editClient.editImage).not.toHaveBeenCalled();
        });

        it('should refuse a photo above the size limit', async () => {
            downloadFile.mockResolvedValue(Buffer.alloc(2 * 1024 * 1024));

            await handle(photoMessage());

            expect(editMessageText).toHaveBeenCalledWith(CHAT_ID, PROGRESS_ID, formatImageTooLarge(1));
            expect(deps.contexts.forChat(CHAT_ID).has('photo')).toBe(false);
        });

        it('should run the edit straight away when the photo has a caption', async () => {
            await handle(photoMessage('  add a hat '));

            expect(editClient.editImage).toHaveBeenCalledWith(expect.objectContaining({
                prompt: 'add a hat',
                aspectRatio: '16:9',
            }));
            expect(editMessageText).toHaveBeenCalledWith(CHAT_ID, PROGRESS_ID, formatEditInProgress('add a hat', '16:9'));
            expect(sendPhoto).toHaveBeenCalledWith(CHAT_ID, Buffer.from('edited'), formatEditedCaption('add a hat'), 'jpeg');
            expect(deleteMessage).toHaveBeenCalledWith(CHAT_ID, PROGRESS_ID);
            expect(sendMessage).toHaveBeenLastCalledWith(CHAT_ID, NEXT_STEP_MESSAGE);
        });

        it('should report a download failure', async () => {
            downloadFile.mockRejectedValue(new Error('Failed to resolve Telegram file: timeout'));

            await handle(photoMessage());

            expect(sendMessage).toHaveBeenLastCalledWith(CHAT_ID, '❌ Error processing image. Please try again.');
        });
    });

    describe('edit instructions', () => {
        beforeEach(() => {
            const context = deps.contexts.forChat(CHAT_ID);
            context.set('photo', Buffer.from('photo'));
            context.set('aspectRatio', '4:3');
        });

        it('should ask for a photo first when none is stashed', async () => {
            deps.contexts.forChat(CHAT_ID).clear();

            await handle(textMessage('make it night'));

            expect(sendMessage).toHaveBeenCalledWith(CHAT_ID, PHOTO_REQUIRED_MESSAGE);
            expect(editClient.editImage).not.toHaveBeenCalled();
        });

        it('should edit the stashed photo and send the result', async () => {
            await handle(textMessage('make it night'));

            expect(sendMessage).toHaveBeenNthCalledWith(1, CHAT_ID, '🎨 Processing your edit request...');
            expect(editClient.editImage).toHaveBeenCalledWith(expect.objectContaining({
                prompt: 'make it night',
                aspectRatio: '4:3',
            }));
            expect(sendPhoto).toHaveBeenCalledWith(CHAT_ID, Buffer.from('edited'), formatEditedCaption('make it night'), 'jpeg');
            expect(deleteMessage).toHaveBeenCalledWith(CHAT_ID, PROGRESS_ID);
            expect(deps.contexts.forChat(CHAT_ID).get('photo')?.toString()).toBe('photo');
        });

        it('should send the result in the configured output format', async () => {
            deps = { ...deps, config: { ...config, outputFormat: 'png' } };

            await handle(textMessage('make it night'));

            expect(sendPhoto).toHaveBeenCalledWith(CHAT_ID, Buffer.from('edited'), formatEditedCaption('make it night'), 'png');
        });

        it('should tell the user when the edit produced no image', async () => {
            editClient.editImage.mockRejectedValue(new JobTimedOutError(60, 'job-1'));

            await handle(textMessage('make it night'));

            expect(editMessageText).toHaveBeenLastCalledWith(CHAT_ID, PROGRESS_ID, EDIT_FAILED_MESSAGE);
            expect(sendPhoto).not.toHaveBeenCalled();
        });

        it('should report unexpected errors while delivering the result', async () => {
            sendPhoto.mockRejectedValue(new Error('Request failed with status code 413'));

            await handle(textMessage('make it night'));

            expect(editMessageText).toHaveBeenLastCalledWith(CHAT_ID, PROGRESS_ID, UNEXPECTED_ERROR_MESSAGE);
            expect(deleteMessage).not.toHaveBeenCalled();
        });

        it('should send progress as new messages when the first send failed', async () => {
            sendMessage.mockResolvedValue(undefined);

            await handle(textMessage('make it night'));

            expect(editMessageText).not.toHaveBeenCalled();
            expect(sendMessage).toHaveBeenCalledWith(CHAT_ID, formatEditInProgress('make it night', '4:3'));
            expect(deleteMessage).not.toHaveBeenCalled();
            expect(sendPhoto).toHaveBeenCalled();
        });
    });

    it('should ignore updates without a message', async () => {
        await handleTelegramUpdate({ update_id: 1 }, deps);

        expect(sendMessage).not.toHaveBeenCalled();
    });

    it('should ignore messages without text or photo', async () => {
        await handle({ message_id: 3, chat: { id: CHAT_ID } });

        expect(sendMessage).not.toHaveBeenCalled();
    });
});
