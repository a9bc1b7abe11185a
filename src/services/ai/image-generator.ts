// src/services/ai/image-generator.ts

import sharp from 'sharp';
import { config } from '@/config';
import type { AspectProfile, ContentDraft, ImageArtifact, ImageDimensions } from '@/types';
import { TopicCatalog } from '@/services/content/topic-catalog';
import { seededRandom, stringUtils } from '@/utils/helpers';
import { createServiceLogger } from '@/utils/logger';

const logger = createServiceLogger('ImageGenerator');

export const IMAGE_PROFILES: Record<AspectProfile, ImageDimensions> = {
    wide: { width: 1200, height: 675, aspectRatio: '16:9' },
    square: { width: 1080, height: 1080, aspectRatio: '1:1' },
    portrait: { width: 1080, height: 1350, aspectRatio: '4:5' }
};

const FALLBACK_BACKGROUND = '#1f2937';
const FALLBACK_TEXT = '#f9fafb';

/** SVG markup in, PNG bytes out */
export type Rasterizer = (svg: string, dimensions: ImageDimensions) => Promise<Buffer>;

export const sharpRasterizer: Rasterizer = async (svg, { width, height }) => {
    return sharp(Buffer.from(svg))
        .resize(width, height)
        .png()
        .toBuffer();
};

type Motif = 'orbs' | 'chart';

export interface ImageGeneratorDeps {
    catalog: TopicCatalog;
    rasterizer?: Rasterizer;
    brandHandle?: string;
}

export class ImageGenerator {
    private static instance: ImageGenerator;
    private readonly catalog: TopicCatalog;
    private readonly rasterize: Rasterizer;
    private readonly brandHandle: string;

    constructor(deps: ImageGeneratorDeps) {
        this.catalog = deps.catalog;
        this.rasterize = deps.rasterizer ?? sharpRasterizer;
        this.brandHandle = deps.brandHandle ?? config.image.brandHandle;
    }

    public static getInstance(): ImageGenerator {
        if (!ImageGenerator.instance) {
            ImageGenerator.instance = new ImageGenerator({ catalog: TopicCatalog.getInstance() });
        }
        return ImageGenerator.instance;
    }

    /**
     * Render the post image. Never rejects: rendering errors give a degraded fallback artifact.
     */
    public async generate(
        draft: ContentDraft,
        profile: AspectProfile = config.image.profile,
        seed: number = seededRandom.hash(`${draft.topicId}:${draft.body}`)
    ): Promise<ImageArtifact> {
        const dimensions = IMAGE_PROFILES[profile];

        try {
            const svg = this.renderScene(draft, dimensions, seed);
            const data = await this.rasterize(svg, dimensions);
            logger.debug('Post image rendered', { topicId: draft.topicId, profile, bytes: data.length });
            return { data, mimeType: 'image/png', profile, ...this.size(dimensions), degraded: false };
        } catch (error: unknown) {
            logger.error('Image rendering failed, using fallback artifact', error, { topicId: draft.topicId, profile });
            return this.fallbackArtifact(draft, profile);
        }
    }

    /**
     * Solid background plus topic label. Raw SVG bytes when even rasterizing fails.
     */
    public async fallbackArtifact(draft: ContentDraft, profile: AspectProfile): Promise<ImageArtifact> {
        const dimensions = IMAGE_PROFILES[profile];
        const svg = this.renderFallback(draft.topicName, dimensions);

        try {
            const data = await this.rasterize(svg, dimensions);
            return { data, mimeType: 'image/png', profile, ...this.size(dimensions), degraded: true };
        } catch (error: unknown) {
            logger.warn('Fallback rasterizing failed, publishing SVG bytes', {
                error: error instanceof Error ? error.message : String(error)
            });
            return {
                data: Buffer.from(svg, 'utf-8'),
                mimeType: 'image/svg+xml',
                profile,
                ...this.size(dimensions),
                degraded: true
            };
        }
    }

    public renderScene(draft: ContentDraft, dimensions: ImageDimensions, seed: number): string {
        const { width, height } = dimensions;
        const [primary, text, shadow, accent] = this.catalog.getSeed(draft.category).palette;
        const random = seededRandom.create(seed);
        const motif: Motif = random() < 0.5 ? 'orbs' : 'chart';

        const { title, subtitle } = this.splitTitle(draft.body);
        const unit = Math.min(width, height) / 100;
        const titleSize = Math.round(unit * 5.5);
        const bodySize = Math.round(unit * 3.2);
        const maxChars = Math.floor((width * 0.8) / (titleSize * 0.55));
        const titleLines = this.splitTextIntoLines(title, maxChars, 3);
        const bodyLines = this.splitTextIntoLines(subtitle, Math.floor(maxChars * 1.6), 4);

        const panelX = width * 0.08;
        const panelY = height * 0.22;
        const panelWidth = width * 0.84;
        const panelHeight = height * 0.6;

        const titleSpans = titleLines
            .map((line, i) =>
                `<tspan x="${panelX + unit * 4}" dy="${i === 0 ? 0 : titleSize * 1.25}">${stringUtils.escapeXml(line)}</tspan>`)
            .join('');
        const bodySpans = bodyLines
            .map((line, i) =>
                `<tspan x="${panelX + unit * 4}" dy="${i === 0 ? 0 : bodySize * 1.4}">${stringUtils.escapeXml(line)}</tspan>`)
            .join('');
        const bodyY = panelY + unit * 8 + titleLines.length * titleSize * 1.25 + unit * 2;

        const handle = this.brandHandle
            ? `<text x="${width - unit * 4}" y="${height - unit * 4}" font-family="Arial, sans-serif" font-size="${bodySize}" text-anchor="end" fill="${text}" opacity="0.8">${stringUtils.escapeXml(this.brandHandle)}</text>`
            : '';

        return `
<svg width="${width}" height="${height}" viewBox="0 0 ${width} ${height}" xmlns="http://www.w3.org/2000/svg">
  <defs>
    <linearGradient id="bg" x1="0%" y1="0%" x2="100%" y2="100%">
      <stop offset="0%" stop-color="${primary}"/>
      <stop offset="100%" stop-color="${this.adjustColor(shadow, -10)}"/>
    </linearGradient>
  </defs>
  <rect width="100%" height="100%" fill="url(#bg)"/>
  ${motif === 'orbs' ? this.renderOrbs(dimensions, accent, random) : this.renderChart(dimensions, accent, random)}
  <rect x="${panelX}" y="${panelY}" width="${panelWidth}" height="${panelHeight}" rx="${unit * 2}" fill="${shadow}" opacity="0.55"/>
  <text x="${panelX + unit * 4}" y="${panelY + unit * 8}" font-family="Arial, sans-serif" font-size="${titleSize}" font-weight="bold" fill="${text}">${titleSpans}</text>
  <text x="${panelX + unit * 4}" y="${bodyY}" font-family="Arial, sans-serif" font-size="${bodySize}" fill="${text}" opacity="0.9">${bodySpans}</text>
  <text x="${unit * 4}" y="${unit * 8}" font-family="Arial, sans-serif" font-size="${bodySize}" font-weight="bold" fill="${accent}">${stringUtils.escapeXml(draft.category.toUpperCase())}</text>
  ${handle}
</svg>`.trim();
    }

    private renderFallback(label: string, { width, height }: ImageDimensions): string {
        const fontSize = Math.round(Math.min(width, height) / 16);
        return `
<svg width="${width}" height="${height}" viewBox="0 0 ${width} ${height}" xmlns="http://www.w3.org/2000/svg">
  <rect width="100%" height="100%" fill="${FALLBACK_BACKGROUND}"/>
  <text x="${width / 2}" y="${height / 2}" font-family="Arial, sans-serif" font-size="${fontSize}" font-weight="bold" text-anchor="middle" fill="${FALLBACK_TEXT}">${stringUtils.escapeXml(label)}</text>
</svg>`.trim();
    }

    private renderOrbs({ width, height }: ImageDimensions, color: string, random: () => number): string {
        const count = 4 + Math.floor(random() * 4);
        return Array.from({ length: count }, () => {
            const cx = Math.round(random() * width);
            const cy = Math.round(random() * height);
            const r = Math.round(Math.min(width, height) * (0.04 + random() * 0.12));
            const opacity = (0.08 + random() * 0.2).toFixed(2);
            return `<circle cx="${cx}" cy="${cy}" r="${r}" fill="${color}" opacity="${opacity}"/>`;
        }).join('\n  ');
    }

    private renderChart({ width, height }: ImageDimensions, color: string, random: () => number): string {
        const steps = 12;
        let level = height * (0.75 + random() * 0.1);
        const points = Array.from({ length: steps + 1 }, (_, i) => {
            level = Math.max(height * 0.1, Math.min(height * 0.9, level - height * (random() - 0.35) * 0.12));
            return `${Math.round((width / steps) * i)},${Math.round(level)}`;
        });
        return `<polyline points="${points.join(' ')}" fill="none" stroke="${color}" stroke-width="${Math.round(width / 200)}" opacity="0.35"/>`;
    }

    /**
     * Title is the first sentence; the rest of the body goes under it
     */
    private splitTitle(body: string): { title: string; subtitle: string } {
        const boundary = body.indexOf('. ');
        if (boundary < 0) return { title: body, subtitle: '' };
        return {
            title: body.slice(0, boundary + 1),
            subtitle: body.slice(boundary + 2).trim()
        };
    }

    private splitTextIntoLines(text: string, maxLength: number, maxLines: number): string[] {
        const words = text.split(/\s+/).filter(Boolean);
        const lines: string[] = [];
        let currentLine = '';

        for (const word of words) {
            if ((currentLine + ' ' + word).trim().length <= maxLength) {
                currentLine += (currentLine ? ' ' : '') + word;
            } else {
                if (currentLine) lines.push(currentLine);
                currentLine = word;
            }
        }
        if (currentLine) lines.push(currentLine);

        if (lines.length <= maxLines) return lines;
        const kept = lines.slice(0, maxLines);
        // The next line starts with a word that did not fit, so this always ends in a marker
        kept[maxLines - 1] = stringUtils.truncateAtWord(`${kept[maxLines - 1] ?? ''} ${lines[maxLines] ?? ''}`, maxLength);
        return kept;
    }

    /**
     * Shift a hex color's brightness by a percentage
     */
    private adjustColor(color: string, amount: number): string {
        const num = parseInt(color.replace('#', ''), 16);
        const amt = Math.round(2.55 * amount);
        const clamp = (value: number): number => Math.max(0, Math.min(255, value));
        const r = clamp((num >> 16) + amt);
        const g = clamp(((num >> 8) & 0xff) + amt);
        const b = clamp((num & 0xff) + amt);
        return '#' + ((1 << 24) + (r << 16) + (g << 8) + b).toString(16).slice(1);
    }

    private size({ width, height }: ImageDimensions): { width: number; height: number } {
        return { width, height };
    }
}

export default ImageGenerator;
