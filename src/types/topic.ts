// src/types/topic.ts

export const TOPIC_CATEGORIES = ['Bitcoin', 'Lightning Network', 'Nostr', 'Privacy', 'Node Setup'] as const;

export type TopicCategory = typeof TOPIC_CATEGORIES[number];

export interface Topic {
    id: string;
    name: string;
    category: TopicCategory;
    enabled: boolean;
    priority: number;
}

export interface CategorySeed {
    /** Hex colors: primary, text, shadow, accent */
    palette: [string, string, string, string];
    hashtags: string[];
}

export interface TopicUpdate {
    enabled?: boolean;
    priority?: number;
}
