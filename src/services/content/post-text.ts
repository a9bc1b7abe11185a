// src/services/content/post-text.ts

const HASHTAG_SEPARATOR = '\n\n';

/**
 * The text the platform receives: body, a blank line, then the space-separated hashtags
 */
export const composePostText = (body: string, hashtags: readonly string[]): string => {
    const content = body.trim();
    const tags = hashtags.join(' ');
    return tags ? `${content}${HASHTAG_SEPARATOR}${tags}` : content;
};

/**
 * Characters left for the body once the hashtag block is appended
 */
export const bodyBudget = (characterBudget: number, hashtags: readonly string[]): number => {
    if (hashtags.length === 0) return characterBudget;
    return Math.max(0, characterBudget - HASHTAG_SEPARATOR.length - hashtags.join(' ').length);
};
