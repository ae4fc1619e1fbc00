import axios from 'axios';
import FormData from 'form-data';
import { OutputFormat } from '../../domain/entities/EditRequest';
import { describeHttpError } from '../../infrastructure/http/describeHttpError';

const MAX_MESSAGE_LENGTH = 4000;

interface TelegramApiResponse<T> {
    ok: boolean;
    result?: T;
    description?: string;
}

interface SentMessage {
    message_id: number;
}

interface TelegramFile {
    file_id: string;
    file_path?: string;
    file_size?: number;
}

function truncate(text: string, suffix: string): string {
    return text.length > MAX_MESSAGE_LENGTH ? text.substring(0, MAX_MESSAGE_LENGTH) + suffix : text;
}

function photoFilename(format: OutputFormat): string {
    return format === 'png' ? 'edited.png' : 'edited.jpg';
}

/**
 * Thin Telegram Bot API client.
 * Message sends are best-effort: failures are logged, never thrown.
 * File and photo transfers throw, since the caller cannot continue without them.
 * Request URLs embed the bot token, so errors are logged and rethrown as summaries only.
 */
export class ChatService {
    private readonly botToken: string;
    private readonly baseUrl: string;

    constructor(botToken: string) {
        this.botToken = botToken;
        this.baseUrl = `https://api.telegram.org/bot${botToken}`;
    }

    /**
     * Sends a text message and returns its message_id, or undefined when sending failed.
     */
    async sendMessage(chatId: number, text: string): Promise<number | undefined> {
        if (!this.botToken) {
            console.warn('[ChatService] Telegram bot token not configured, skipping message send');
            return undefined;
        }

        try {
            const response = await axios.post<TelegramApiResponse<SentMessage>>(`${this.baseUrl}/sendMessage`, {
                chat_id: chatId,
                text: truncate(text, '... (truncated)'),
                parse_mode: 'Markdown'
            });
            return response.data.result?.message_id;
        } catch (error) {
            // Unescaped Markdown entities are rejected with a 400; resend as plain text
            if (axios.isAxiosError(error) && error.response?.status === 400) {
                try {
                    console.warn('[ChatService] Markdown send failed, retrying as plain text...');
                    const response = await axios.post<TelegramApiResponse<SentMessage>>(`${this.baseUrl}/sendMessage`, {
                        chat_id: chatId,
                        text: truncate(text.replace(/[*_`]/g, ''), '...')
                    });
                    return response.data.result?.message_id;
                } catch (retryError) {
                    console.error(`[ChatService] Retry failed: ${describeHttpError(retryError)}`);
                    return undefined;
                }
            }
            console.error(`[ChatService] Failed to send message to chat ${chatId}: ${describeHttpError(error)}`);
            return undefined;
        }
    }

    /**
     * Replaces the text of a message the bot sent earlier.
     */
    async editMessageText(chatId: number, messageId: number, text: string): Promise<void> {
        try {
            await axios.post(`${this.baseUrl}/editMessageText`, {
                chat_id: chatId,
                message_id: messageId,
                text: truncate(text, '...')
            });
        } catch (error) {
            console.error(`[ChatService] Failed to edit message ${messageId} in chat ${chatId}: ${describeHttpError(error)}`);
        }
    }

    async deleteMessage(chatId: number, messageId: number): Promise<void> {
        try {
            await axios.post(`${this.baseUrl}/deleteMessage`, {
                chat_id: chatId,
                message_id: messageId
            });
        } catch (error) {
            console.error(`[ChatService] Failed to delete message ${messageId} in chat ${chatId}: ${describeHttpError(error)}`);
        }
    }

    /**
     * Resolves a Telegram file_id to a downloadable URL.
     * Note: the URL embeds the bot token, so it must not be logged or shared.
     */
    async getFileUrl(fileId: string): Promise<string> {
        if (!this.botToken) {
            throw new Error('Telegram bot token not configured');
        }

        try {
            const response = await axios.get<TelegramApiResponse<TelegramFile>>(`${this.baseUrl}/getFile`, {
                params: { file_id: fileId }
            });

            const filePath = response.data.result?.file_path;
            if (!response.data.ok || !filePath) {
                throw new Error('Failed to get file path from Telegram');
            }

            // Format: https://api.telegram.org/file/bot<token>/<file_path>
            return `https://api.telegram.org/file/bot${this.botToken}/${filePath}`;
        } catch (error) {
            const message = describeHttpError(error);
            console.error(`[ChatService] Error resolving Telegram file URL: ${message}`);
            throw new Error(`Failed to resolve Telegram file: ${message}`);
        }
    }

    /**
     * Downloads a file sent to the bot.
     */
    async downloadFile(fileId: string): Promise<Buffer> {
        const url = await this.getFileUrl(fileId);
        try {
            const response = await axios.get<ArrayBuffer>(url, { responseType: 'arraybuffer' });
            return Buffer.from(response.data);
        } catch (error) {
            throw new Error(`Failed to download Telegram file: ${describeHttpError(error)}`);
        }
    }

    /**
     * Uploads an image to the chat as a photo, named after its encoding.
     */
    async sendPhoto(chatId: number, photo: Buffer, caption?: string, format: OutputFormat = 'jpeg'): Promise<void> {
        const form = new FormData();
        form.append('chat_id', String(chatId));
        form.append('photo', photo, { filename: photoFilename(format) });
        if (caption) {
            form.append('caption', caption.substring(0, 1024));
        }

        try {
            await axios.post(`${this.baseUrl}/sendPhoto`, form, {
                headers: form.getHeaders(),
                maxBodyLength: Infinity
            });
        } catch (error) {
            throw new Error(`Failed to send photo to chat ${chatId}: ${describeHttpError(error)}`);
        }
    }
}
