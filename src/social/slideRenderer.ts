/**
 * Renders a draft's carousel slides to PNG and writes a manifest.
 *
 * Output in <outDir>/: slide-1.png .. slide-N.png, caption.txt, manifest.json.
 */

import * as crypto from "crypto";
import * as fs from "fs";
import * as path from "path";
import sharp from "sharp";
import type { Slide } from "../contracts";
import { createSlideSvg, SLIDE_HEIGHT, SLIDE_WIDTH } from "../lib/slideSvg";
import { getBrand } from "./registry";

export interface RenderableDraft {
  id: number;
  brand: string;
  slides: readonly Slide[];
  caption: string;
  hashtags: readonly string[];
}

export interface RenderManifest {
  schemaVersion: string;
  draftId: number;
  brand: string;
  generatedAt: string;
  slides: Array<{
    index: number;
    title: string;
    path: string;
    width: number;
    height: number;
    sizeBytes: number;
    sha256: string;
  }>;
  caption: {
    path: string;
    charCount: number;
    sha256: string;
  };
}

function sha256File(filePath: string): string {
  return crypto.createHash("sha256").update(fs.readFileSync(filePath)).digest("hex");
}

/** Caption followed by a blank line and the hashtags. */
export function captionFileText(draft: RenderableDraft): string {
  return draft.hashtags.length > 0
    ? `${draft.caption}\n\n${draft.hashtags.join(" ")}\n`
    : `${draft.caption}\n`;
}

export async function renderDraftSlides(
  draft: RenderableDraft,
  outDir: string,
  now: () => Date = () => new Date()
): Promise<RenderManifest> {
  const brand = getBrand(draft.brand);
  fs.mkdirSync(outDir, { recursive: true });

  const slides: RenderManifest["slides"] = [];
  for (const [i, slide] of draft.slides.entries()) {
    const fileName = `slide-${i + 1}.png`;
    const filePath = path.join(outDir, fileName);
    const svg = createSlideSvg({
      title: slide.title,
      body: slide.body,
      index: i + 1,
      total: draft.slides.length,
      brand: brand.spec.display,
      theme: brand.spec.theme,
    });

    const info = await sharp(svg).resize(SLIDE_WIDTH, SLIDE_HEIGHT).png().toFile(filePath);
    slides.push({
      index: i + 1,
      title: slide.title,
      path: fileName,
      width: info.width,
      height: info.height,
      sizeBytes: info.size,
      sha256: sha256File(filePath),
    });
    console.log(`[render] Wrote ${filePath}`);
  }

  const captionPath = path.join(outDir, "caption.txt");
  const captionText = captionFileText(draft);
  fs.writeFileSync(captionPath, captionText, "utf-8");

  const manifest: RenderManifest = {
    schemaVersion: "1.0",
    draftId: draft.id,
    brand: draft.brand,
    generatedAt: now().toISOString(),
    slides,
    caption: {
      path: "caption.txt",
      charCount: captionText.length,
      sha256: sha256File(captionPath),
    },
  };
  const manifestPath = path.join(outDir, "manifest.json");
  fs.writeFileSync(manifestPath, JSON.stringify(manifest, null, 2), "utf-8");
  console.log(`[render] Wrote ${manifestPath}`);

  return manifest;
}
