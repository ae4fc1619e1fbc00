import { Config, getPollBudgetSeconds } from '../../config';
import { AspectRatioLabel } from '../../domain/entities/AspectRatio';

export const EDIT_FAILED_MESSAGE = '❌ Failed to edit image. Please try again with a different prompt.';
export const UNEXPECTED_ERROR_MESSAGE = '❌ An error occurred. Please try again.';
export const PHOTO_REQUIRED_MESSAGE = '📷 Please send a photo first!\nUse /start to see how to use the bot.';

export function formatWelcomeMessage(firstName: string): string {
    return `🎨 *AI Image Editor Bot*

Hi ${firstName}!

*Two ways to use:*

*Method 1* (Quick): Send a photo with a caption
📷➕📝 The caption is your edit instruction

*Method 2* (Step-by-step):
1. Send me an image
2. Send a text description of how you want to edit it

*Examples:*
• "Change the car color to red"
• "Add sunglasses to the person"
• "Make the sky sunset colored"

The bot keeps your image's original aspect ratio!`;
}

export function formatHelpMessage(): string {
    return `🔧 *Bot Commands & Usage*

*Commands:*
• /start - Start the bot
• /help - Show this help message
• /clear - Clear current image from memory
• /status - Show bot status

*How to edit images:*
1. Send a photo (optionally with your instruction as caption)
2. Send your editing instruction as text
3. Wait for the AI to process your request

*Tips:*
• Be specific in your descriptions
• Processing may take 10-30 seconds
• Every new instruction starts from the photo you sent
• You can send a new image anytime`;
}

export function formatStatusMessage(config: Config): string {
    return `🤖 *Bot Status*

✅ Bot is running
🔧 Environment: ${config.environment}
📊 Max image size: ${config.maxImageSizeMb}MB
⏱️ Edit timeout: ${getPollBudgetSeconds(config)}s
🎯 Default aspect ratio: ${config.defaultAspectRatio}`;
}

export function formatPhotoReceived(aspectRatio: AspectRatioLabel): string {
    return `✅ Image received!\n📐 Detected aspect ratio: ${aspectRatio}\n\n💬 Now send me your editing instructions!`;
}

export function formatEditInProgress(prompt: string, aspectRatio: AspectRatioLabel): string {
    return `🎨 Editing your image...\n📝 Prompt: ${prompt}\n📐 Aspect ratio: ${aspectRatio}\n\n⏳ This may take 10-30 seconds...`;
}

export function formatEditedCaption(prompt: string): string {
    return `✨ Edited Image\n📝 Prompt: ${prompt}`;
}

export function formatImageTooLarge(maxImageSizeMb: number): string {
    return `❌ Image too large. Maximum size is ${maxImageSizeMb}MB.`;
}
