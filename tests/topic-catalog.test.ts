// tests/topic-catalog.test.ts

import fs from 'fs/promises';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import catalogJson from '../src/data/catalog.json';
import { PromptStore } from '../src/services/content/prompt-store';
import { TopicCatalog } from '../src/services/content/topic-catalog';
import { ConfigurationError } from '../src/utils/errors';
import { catalogData, makeTempDir, removeDir, topic } from './helpers/fakes';

const topics = () => [
    topic('bitcoin-basics'),
    topic('nostr-relays', { category: 'Nostr', priority: 2 }),
    topic('tor-setup', { category: 'Privacy', enabled: false })
];

describe('TopicCatalog', () => {
    let dir: string;
    let overridesPath: string;

    beforeEach(async () => {
        dir = await makeTempDir();
        overridesPath = path.join(dir, 'topic-overrides.json');
    });

    afterEach(async () => {
        await removeDir(dir);
    });

    it('accepts the bundled catalog', () => {
        const catalog = TopicCatalog.fromData(catalogJson);

        expect(catalog.list()).toHaveLength(50);
        expect(catalog.getSeed('Nostr').palette).toHaveLength(4);
    });

    it('rejects catalog data that does not validate', () => {
        expect(() => TopicCatalog.fromData({ topics: [] })).toThrow(ConfigurationError);
        expect(() => TopicCatalog.fromData(catalogData([topic('Bad Id')]))).toThrow(ConfigurationError);
    });

    it('keeps table order and lists only enabled topics', () => {
        const catalog = new TopicCatalog(catalogData(topics()));

        expect(catalog.list().map(entry => entry.id)).toEqual(['bitcoin-basics', 'nostr-relays', 'tor-setup']);
        expect(catalog.listEnabled().map(entry => entry.id)).toEqual(['bitcoin-basics', 'nostr-relays']);
        expect(catalog.indexOf('tor-setup')).toBe(2);
        expect(catalog.indexOf('missing')).toBe(-1);
        expect(Object.isFrozen(catalog.get('bitcoin-basics'))).toBe(true);
    });

    it('updates enabled and priority and persists them as overrides', async () => {
        const catalog = new TopicCatalog(catalogData(topics()), overridesPath);

        const updated = await catalog.update('tor-setup', { enabled: true });
        await catalog.update('tor-setup', { priority: 5 });

        expect(updated.enabled).toBe(true);
        expect(catalog.get('tor-setup')).toEqual(topic('tor-setup', { category: 'Privacy', enabled: true, priority: 5 }));
        expect(JSON.parse(await fs.readFile(overridesPath, 'utf-8'))).toEqual({
            'tor-setup': { enabled: true, priority: 5 }
        });

        const reloaded = new TopicCatalog(catalogData(topics()), overridesPath);
        await reloaded.load();
        expect(reloaded.listEnabled().map(entry => entry.id)).toEqual(['bitcoin-basics', 'nostr-relays', 'tor-setup']);
    });

    it('rejects updates to unknown topics or with bad values', async () => {
        const catalog = new TopicCatalog(catalogData(topics()), overridesPath);

        await expect(catalog.update('nope', { enabled: true })).rejects.toThrow('Unknown topic: nope');
        await expect(catalog.update('bitcoin-basics', { priority: 'high' })).rejects.toThrow(ConfigurationError);
        await expect(catalog.update('bitcoin-basics', {})).rejects.toThrow(ConfigurationError);
        expect(catalog.get('bitcoin-basics')?.priority).toBe(1);
    });

    it('ignores overrides for topics it does not know', async () => {
        await fs.writeFile(overridesPath, JSON.stringify({
            'retired-topic': { enabled: true },
            'bitcoin-basics': { enabled: false }
        }));

        const catalog = new TopicCatalog(catalogData(topics()), overridesPath);
        await catalog.load();

        expect(catalog.listEnabled().map(entry => entry.id)).toEqual(['nostr-relays']);
    });
});

describe('PromptStore', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await makeTempDir();
    });

    afterEach(async () => {
        await removeDir(dir);
    });

    it('stores custom prompts per topic and reloads them', async () => {
        const file = path.join(dir, 'custom-prompts.json');
        const store = new PromptStore(file);
        await store.set('nostr-relays', 'Explain relays to a newcomer.');
        await store.set('bitcoin-basics', 'Explain blocks.');
        await expect(store.remove('bitcoin-basics')).resolves.toBe(true);
        await expect(store.remove('bitcoin-basics')).resolves.toBe(false);

        const reloaded = new PromptStore(file);
        await reloaded.load();

        expect(reloaded.get('nostr-relays')).toBe('Explain relays to a newcomer.');
        expect(reloaded.get('bitcoin-basics')).toBeUndefined();
    });
});
