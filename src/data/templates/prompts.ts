// src/data/templates/prompts.ts

import type { Topic } from '@/types';

export const CONTENT_GENERATION_PROMPTS = {
    /**
     * Default prompt for a topic. `characterBudget` is what remains for the body after the hashtag block.
     */
    topicPost: (params: { topic: Topic; characterBudget: number }) => `
Write a concise, informative post about ${params.topic.name} in the context of ${params.topic.category}.

REQUIREMENTS:
- Educational and engaging
- Under ${params.characterBudget} characters
- End with a thought-provoking question or call to action
- Do not include hashtags
- Reply with the post text only
`.trim()
};

/**
 * Fallback body templates. `{topic}` and `{category}` are substituted.
 */
export const FALLBACK_TEMPLATES: readonly string[] = [
    'Exploring the world of {topic} today. What\'s your experience with it?',
    'Did you know? {topic} is changing how we think about digital sovereignty. Learn more!',
    'The future of {topic} looks promising. Here\'s why it matters for everyone in the {category} space.',
    '{topic} offers incredible possibilities for freedom and privacy. Are you taking advantage of it?',
    'Just set up a new {topic} configuration. Game-changer for my {category} experience!',
    'Thinking about {topic} and its implications for the future of {category}. Thoughts?',
    'Today\'s focus: {topic}. Essential knowledge for anyone interested in {category}.',
    '{topic} might be the most underrated aspect of {category}. Change my mind!',
    'The evolution of {topic} shows how far we\'ve come in the {category} ecosystem.',
    'Security tip: Always consider {topic} when working with {category} technologies.'
];

export const fillTemplate = (template: string, topic: Topic): string => {
    return template
        .replace(/\{topic\}/g, topic.name)
        .replace(/\{category\}/g, topic.category);
};

