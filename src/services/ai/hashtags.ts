// src/services/ai/hashtags.ts

import { TOPIC_CATEGORIES, type CategorySeed, type Topic, type TopicCategory } from '@/types';
import { seededRandom, stringUtils } from '@/utils/helpers';

export interface HashtagParams {
    topic: Topic;
    seeds: Readonly<Record<TopicCategory, CategorySeed>>;
    count: number;
    /** Changes the ordering so repeated posts on one topic differ */
    variation?: number | string;
}

/**
 * Exactly `count` unique hashtags (compared case-insensitively), deterministic for the same params.
 *
 * Order of sources: the topic-name tag, the topic's category pool (seeded shuffle),
 * the other categories' pools, then numbered topic-name tags if the pools run out.
 */
export const buildHashtags = ({ topic, seeds, count, variation = 0 }: HashtagParams): string[] => {
    const random = seededRandom.create(seededRandom.hash(`${topic.id}:${variation}`));
    const topicTag = stringUtils.toHashtag(topic.name);
    const base = topicTag.length > 1 ? topicTag : stringUtils.toHashtag(topic.category);

    const result: string[] = [];
    const seen = new Set<string>();
    const add = (tag: string): void => {
        const key = tag.toLowerCase();
        if (result.length < count && tag.length > 1 && !seen.has(key)) {
            seen.add(key);
            result.push(tag);
        }
    };

    add(base);
    seededRandom.shuffle(seeds[topic.category].hashtags, random).forEach(add);

    for (const category of TOPIC_CATEGORIES) {
        if (category === topic.category) continue;
        seededRandom.shuffle(seeds[category].hashtags, random).forEach(add);
    }

    for (let n = 1; result.length < count; n++) {
        add(`${base}${n}`);
    }

    return result;
};
