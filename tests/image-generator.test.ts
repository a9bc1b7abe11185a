// tests/image-generator.test.ts

import { describe, expect, it } from 'vitest';
import { IMAGE_PROFILES, ImageGenerator, type Rasterizer } from '../src/services/ai/image-generator';
import { TopicCatalog } from '../src/services/content/topic-catalog';
import { catalogData, draft, failingRasterizer, stubRasterizer, topic } from './helpers/fakes';

const catalog = new TopicCatalog(catalogData([topic('bitcoin-basics', { name: 'Bitcoin basics' })]));

describe('ImageGenerator', () => {
    it('defines the three aspect profiles', () => {
        expect(IMAGE_PROFILES).toEqual({
            wide: { width: 1200, height: 675, aspectRatio: '16:9' },
            square: { width: 1080, height: 1080, aspectRatio: '1:1' },
            portrait: { width: 1080, height: 1350, aspectRatio: '4:5' }
        });
    });

    it('rasterizes the scene at the profile size', async () => {
        const generator = new ImageGenerator({ catalog, rasterizer: stubRasterizer, brandHandle: '' });

        const image = await generator.generate(draft(), 'square');

        expect(image.mimeType).toBe('image/png');
        expect(image.data.toString()).toBe('png:1080x1080');
        expect([image.width, image.height, image.profile, image.degraded]).toEqual([1080, 1080, 'square', false]);
    });

    it('degrades to the plain fallback when the scene fails to render', async () => {
        const svgs: string[] = [];
        let calls = 0;
        const flaky: Rasterizer = async (svg, dimensions) => {
            calls++;
            svgs.push(svg);
            if (calls === 1) throw new Error('font missing');
            return stubRasterizer(svg, dimensions);
        };
        const generator = new ImageGenerator({ catalog, rasterizer: flaky, brandHandle: '' });

        const image = await generator.generate(draft(), 'wide');

        expect(image.mimeType).toBe('image/png');
        expect(image.degraded).toBe(true);
        expect(svgs[1]).toContain('fill="#1f2937"');
        expect(svgs[1]).toContain('>Bitcoin basics</text>');
    });

    it('returns the fallback SVG bytes when rasterizing is impossible', async () => {
        const generator = new ImageGenerator({ catalog, rasterizer: failingRasterizer, brandHandle: '' });

        const image = await generator.generate(draft(), 'portrait');

        expect(image.mimeType).toBe('image/svg+xml');
        expect(image.degraded).toBe(true);
        expect([image.width, image.height]).toEqual([1080, 1350]);
        expect(image.data.toString('utf-8')).toContain('<svg width="1080" height="1350"');
    });

    describe('renderScene', () => {
        const generator = new ImageGenerator({ catalog, rasterizer: stubRasterizer, brandHandle: '@example' });

        it('is deterministic for a seed', () => {
            const dimensions = IMAGE_PROFILES.wide;
            expect(generator.renderScene(draft(), dimensions, 99)).toBe(generator.renderScene(draft(), dimensions, 99));
        });

        it('labels the category and the brand handle', () => {
            const svg = generator.renderScene(draft(), IMAGE_PROFILES.wide, 1);

            expect(svg).toContain('>BITCOIN</text>');
            expect(svg).toContain('>@example</text>');
            expect(svg).toContain('stop-color="#112233"');
        });

        it('escapes markup in the post text', () => {
            const svg = generator.renderScene(draft({ body: 'Fees < 1 sat & rising. Plan ahead.' }), IMAGE_PROFILES.square, 1);

            expect(svg).toContain('Fees &lt; 1 sat &amp; rising.');
            expect(svg).not.toContain('Fees < 1');
        });
    });
});
