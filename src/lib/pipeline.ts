import fs from 'fs';
import path from 'path';
import type {
  DensityScores,
  GridIndex,
  MapItem,
  MapManifest,
  Placement,
  RepresentativeLevels,
} from './types';
import type { MapConfig } from './config';
import { DegenerateInputWarning, logErrorDetails } from './errors';
import { loadItems, type SkippedRow } from './ingest';
import { buildGridIndex, computeBounds, detectDegenerateInput } from './spatial-grid';
import { selectRepresentatives, verifyHierarchy } from './representatives';
import { estimateDensity } from './density';
import { buildLayout, selectLayoutCandidates } from './layout';
import { buildPlacementExport, exportLevels, placementFileName, serializeDocument, type RenderedFile } from './exporter';
import { generateThumbnails } from './thumbnails';
import { writeFileAtomic, writeJsonAtomic } from './atomic-write';
import { runWithConcurrency } from './map-utils';

// ==========================================
// CORE
// ==========================================

export type MapCoreConfig = Pick<MapConfig, 'resolutions' | 'margin' | 'density' | 'representative' | 'layout'>;

export type MapResult = {
  items: readonly MapItem[];
  itemsById: ReadonlyMap<string, MapItem>;
  index: GridIndex;
  representatives: RepresentativeLevels;
  density: DensityScores;
  placements: readonly Placement[];
  warnings: DegenerateInputWarning[];
};

/**
 * Grid → representatives → density → layout over an in-memory item set.
 * No I/O; the same input and config always give the same result.
 */
export function buildMap(items: readonly MapItem[], config: MapCoreConfig): MapResult {
  const itemsById = new Map(items.map((item) => [item.id, item]));
  const bounds = computeBounds(items, config.margin);
  const warnings = detectDegenerateInput(items, bounds);

  const index = buildGridIndex(items, config.resolutions, bounds);
  const representatives = selectRepresentatives(index, itemsById, config.representative);
  const density = estimateDensity(index, config.density);
  const candidates = selectLayoutCandidates(index, representatives, density, {
    resolution: config.layout.resolution,
    minDensity: config.layout.minDensity,
  });
  const placements = buildLayout(candidates, config.layout);

  return { items, itemsById, index, representatives, density, placements, warnings };
}

// ==========================================
// PIPELINE
// ==========================================

export type PipelineSummary = {
  items: number;
  skipped: SkippedRow[];
  warnings: DegenerateInputWarning[];
  files: string[];
  manifest: MapManifest;
};

const BANNER = '━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━';

export class MapPipeline {
  private config: MapConfig;

  constructor(config: MapConfig) {
    this.config = config;
  }

  async run(): Promise<PipelineSummary> {
    const { config } = this;

    this.section('INPUT: Loading projected points');
    const { items, skipped } = await loadItems(config.input);
    console.log(`   Loaded ${items.length.toLocaleString()} items from ${config.input}`);
    for (const row of skipped) {
      console.warn(`   ⚠️ Skipped row ${row.row}${row.id ? ` (${row.id})` : ''}: ${row.reason}`);
    }

    this.section('CORE: Grid, representatives, density, layout');
    const result = buildMap(items, config);
    for (const warning of result.warnings) {
      console.warn(`   ⚠️ ${warning.name} [${warning.kind}]: ${warning.message}`);
    }
    for (const level of result.index.levels) {
      this.debug(`   Grid ${level.resolution}x${level.resolution}: ${level.cells.size} populated cells`);
    }
    if (config.verbose) {
      const violations = verifyHierarchy(result.index, result.representatives);
      for (const v of violations) {
        console.warn(`   ⚠️ Hierarchy violation at ${v.resolution} ${v.cellKey} (${v.id ?? 'none'}): ${v.reason}`);
      }
    }
    console.log(`   ✅ ${result.placements.length} placements at ${config.layout.resolution}x${config.layout.resolution}`);

    let thumbnails: Map<string, string> | undefined;
    if (config.thumbnails.enabled) {
      this.section('OUTPUT: Generating thumbnails');
      thumbnails = await generateThumbnails(this.representativeItems(result), {
        outputDir: config.outputDir,
        sourceField: config.thumbnails.sourceField,
        sourceBaseDir: path.dirname(path.resolve(config.input)),
        maxSize: config.thumbnails.maxSize,
        quality: config.thumbnails.quality,
        concurrency: config.concurrency,
        maxRetries: config.maxRetries,
      });
      console.log(`   ✅ ${thumbnails.size} thumbnails`);
    }

    this.section('OUTPUT: Writing interchange documents');
    const rendered = exportLevels(result.index, result.representatives, result.itemsById, {
      resolutions: config.export.resolutions,
      displayFields: config.export.displayFields,
      examplesPerCell: config.export.examplesPerCell,
      maxDocumentBytes: config.export.maxDocumentBytes,
      imageOverrides: thumbnails,
      placements: config.export.placementsInViewer
        ? new Map(result.placements.map((p) => [p.cellKey, p]))
        : undefined,
      placementResolution: config.layout.resolution,
    });

    const placementExport = buildPlacementExport(result.placements, result.itemsById, config.layout, thumbnails);
    const placementFile: RenderedFile = {
      name: placementFileName(config.layout.resolution),
      contents: serializeDocument(placementExport),
    };

    const files = [...rendered.flatMap((level) => level.files), placementFile];
    this.removeStaleParts(rendered.map((level) => level.resolution), new Set(files.map((f) => f.name)));

    await runWithConcurrency(files, this.config.concurrency, async (file) => {
      const target = path.join(config.outputDir, file.name);
      await writeFileAtomic(target, file.contents, {
        maxRetries: config.maxRetries,
        onRetry: (attempt, delayMs, error) =>
          logErrorDetails(`   ⚠️ Write ${file.name} failed, retry ${attempt} in ${delayMs}ms. `, error),
      });
      const kb = Buffer.byteLength(file.contents, 'utf-8') / 1024;
      console.log(`   📂 ${file.name} (${kb.toFixed(1)} KB)`);
    });

    const manifest: MapManifest = {
      generated_at: new Date().toISOString(),
      items: items.length,
      bounds: result.index.bounds,
      levels: rendered.map((level) => ({
        resolution: level.resolution,
        cells: level.cells,
        files: level.files.map((f) => f.name),
      })),
      placements: placementFile.name,
    };
    await writeJsonAtomic(path.join(config.outputDir, 'manifest.json'), manifest, { maxRetries: config.maxRetries });
    console.log(`\n📂 Output written to ${config.outputDir}`);

    return {
      items: items.length,
      skipped,
      warnings: result.warnings,
      files: [...files.map((f) => f.name), 'manifest.json'],
      manifest,
    };
  }

  /** Each item that represents at least one cell, once, in id order */
  private representativeItems(result: MapResult): MapItem[] {
    const ids = new Set<string>();
    for (const reps of result.representatives.values()) {
      for (const id of reps.values()) ids.add(id);
    }
    const items: MapItem[] = [];
    for (const id of Array.from(ids).sort()) {
      const item = result.itemsById.get(id);
      if (item) items.push(item);
    }
    return items;
  }

  /** Part files from an earlier, larger export would otherwise linger */
  private removeStaleParts(resolutions: number[], keep: Set<string>) {
    if (!fs.existsSync(this.config.outputDir)) return;
    for (const name of fs.readdirSync(this.config.outputDir)) {
      const match = /^grid_(\d+)(?:_part\d+)?\.json$/.exec(name);
      if (!match || keep.has(name) || !resolutions.includes(Number(match[1]))) continue;
      fs.rmSync(path.join(this.config.outputDir, name), { force: true });
      this.debug(`   Removed stale ${name}`);
    }
  }

  private section(title: string) {
    console.log(`\n${BANNER}`);
    console.log(title);
    console.log(BANNER);
  }

  private debug(message: string) {
    if (this.config.verbose) {
      console.log(message);
    }
  }
}
