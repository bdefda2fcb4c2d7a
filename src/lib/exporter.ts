import type {
  CellKey,
  GridIndex,
  GridLevel,
  MapItem,
  Placement,
  PlacementExport,
  PlacementRecord,
  RepresentativeLevels,
  RepresentativeMap,
  ViewerCell,
  ViewerDocument,
  ViewerExample,
} from './types';
import type { LayoutOptions } from './layout';
import { ConfigurationError } from './errors';
import { compareCellKeys, compareIds, squaredDistance } from './map-utils';

// ==========================================
// OPTIONS
// ==========================================

export type ViewerExportOptions = {
  /** Metadata fields copied onto each cell entry, in this order */
  displayFields: readonly string[];
  /** Cell members listed under `examples`; 0 disables the list */
  examplesPerCell: number;
  /** Placements by cell key, attached as `placement` when given */
  placements?: ReadonlyMap<CellKey, Placement>;
  /** Item id → image path replacing the metadata `img` (e.g. generated thumbnails) */
  imageOverrides?: ReadonlyMap<string, string>;
};

export const DEFAULT_DISPLAY_FIELDS = ['caption', 'url', 'img'] as const;

export const DEFAULT_MAX_DOCUMENT_BYTES = 50 * 1024 * 1024;

const RESERVED_FIELDS = new Set(['id', 'count', 'examples', 'placement']);

export const TITLE_MAX_LENGTH = 100;

// ==========================================
// HELPERS
// ==========================================

function displayValues(
  item: MapItem,
  fields: readonly string[],
  imageOverrides: ReadonlyMap<string, string> | undefined,
  includeImage: boolean
): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  for (const field of fields) {
    if (RESERVED_FIELDS.has(field)) continue;
    if (field === 'img') {
      if (!includeImage) continue;
      const override = imageOverrides?.get(item.id);
      if (override !== undefined) {
        values.img = override;
        continue;
      }
    }
    const value = item.metadata[field];
    if (value !== undefined) values[field] = value;
  }
  return values;
}

function buildExamples(
  members: readonly string[],
  representative: MapItem,
  itemsById: ReadonlyMap<string, MapItem>,
  options: ViewerExportOptions
): ViewerExample[] {
  const ranked: { item: MapItem; distance: number }[] = [];
  for (const id of members) {
    const item = itemsById.get(id);
    if (!item) continue;
    ranked.push({ item, distance: squaredDistance(item.x, item.y, representative.x, representative.y) });
  }
  ranked.sort((a, b) => a.distance - b.distance || compareIds(a.item.id, b.item.id));

  return ranked.slice(0, options.examplesPerCell).map(({ item }) => ({
    id: item.id,
    ...displayValues(item, options.displayFields, undefined, false),
  }));
}

export function truncateTitle(caption: string, maxLength = TITLE_MAX_LENGTH): string {
  if (caption.length <= maxLength) return caption;
  return `${caption.slice(0, maxLength - 3)}...`;
}

function stringField(item: MapItem, field: string): string | null {
  const value = item.metadata[field];
  return typeof value === 'string' ? value : null;
}

// ==========================================
// VIEWER DOCUMENTS
// ==========================================

/**
 * One level's cell → representative document. Keys are emitted row-major so
 * re-exporting unchanged input yields identical bytes.
 */
export function buildViewerDocument(
  level: GridLevel,
  representatives: RepresentativeMap,
  itemsById: ReadonlyMap<string, MapItem>,
  options: ViewerExportOptions
): ViewerDocument {
  const document: ViewerDocument = {};
  const keys = Array.from(representatives.keys()).sort(compareCellKeys);

  for (const key of keys) {
    const id = representatives.get(key);
    const members = level.cells.get(key);
    const item = id === undefined ? undefined : itemsById.get(id);
    if (!item || !members) continue;

    const cell: ViewerCell = { id: item.id, count: members.length };
    const display = displayValues(item, options.displayFields, options.imageOverrides, true);
    for (const [field, value] of Object.entries(display)) cell[field] = value;
    if (options.examplesPerCell > 0) {
      cell.examples = buildExamples(members, item, itemsById, options);
    }
    const placement = options.placements?.get(key);
    if (placement) {
      cell.placement = { x: placement.x, y: placement.y, size: placement.size };
    }
    document[key] = cell;
  }
  return document;
}

export function serializeDocument(document: unknown): string {
  return JSON.stringify(document);
}

/**
 * Splits a document whose serialized size exceeds `maxBytes` into parts of
 * roughly equal entry count, preserving key order.
 */
export function splitDocument(document: ViewerDocument, maxBytes = DEFAULT_MAX_DOCUMENT_BYTES): ViewerDocument[] {
  const size = Buffer.byteLength(serializeDocument(document), 'utf-8');
  const entries = Object.entries(document);
  if (size <= maxBytes || entries.length <= 1) return [document];

  const parts = Math.min(entries.length, Math.ceil(size / maxBytes));
  const chunkSize = Math.ceil(entries.length / parts);
  const chunks: ViewerDocument[] = [];
  for (let start = 0; start < entries.length; start += chunkSize) {
    chunks.push(Object.fromEntries(entries.slice(start, start + chunkSize)));
  }
  return chunks;
}

export function documentFileName(resolution: number, part: number | null): string {
  return part === null ? `grid_${resolution}.json` : `grid_${resolution}_part${part}.json`;
}

export type RenderedFile = {
  name: string;
  contents: string;
};

export type RenderedLevel = {
  resolution: number;
  cells: number;
  files: RenderedFile[];
};

/**
 * Renders viewer documents for the requested resolutions (all by default) to
 * file contents. Nothing is written here.
 */
export function exportLevels(
  index: GridIndex,
  representatives: RepresentativeLevels,
  itemsById: ReadonlyMap<string, MapItem>,
  options: ViewerExportOptions & {
    resolutions?: readonly number[];
    maxDocumentBytes?: number;
    /** Level that `placements` belong to; other levels are exported without them */
    placementResolution?: number;
  }
): RenderedLevel[] {
  const wanted = options.resolutions ?? index.levels.map((level) => level.resolution);
  const unknown = wanted.filter((r) => !index.levels.some((level) => level.resolution === r));
  if (unknown.length > 0) {
    throw new ConfigurationError([`cannot export unconfigured resolution(s): ${unknown.join(', ')}`], {
      resolutions: index.levels.map((level) => level.resolution),
    });
  }

  return index.levels
    .filter((level) => wanted.includes(level.resolution))
    .map((level) => {
      const reps = representatives.get(level.resolution) ?? new Map<CellKey, string>();
      const documentOptions =
        level.resolution === options.placementResolution ? options : { ...options, placements: undefined };
      const document = buildViewerDocument(level, reps, itemsById, documentOptions);
      const parts = splitDocument(document, options.maxDocumentBytes);
      const files =
        parts.length === 1
          ? [{ name: documentFileName(level.resolution, null), contents: serializeDocument(parts[0]) }]
          : parts.map((part, i) => ({ name: documentFileName(level.resolution, i + 1), contents: serializeDocument(part) }));
      return { resolution: level.resolution, cells: Object.keys(document).length, files };
    });
}

// ==========================================
// BOARD PLACEMENTS
// ==========================================

export function placementFileName(resolution: number): string {
  return `placements_${resolution}.json`;
}

/**
 * Placement list for the board uploader. The layout parameters travel with
 * the placements so the uploader reuses exactly what produced them.
 */
export function buildPlacementExport(
  placements: readonly Placement[],
  itemsById: ReadonlyMap<string, MapItem>,
  layout: LayoutOptions,
  imageOverrides?: ReadonlyMap<string, string>
): PlacementExport {
  const records: PlacementRecord[] = [];
  for (const placement of placements) {
    const item = itemsById.get(placement.id);
    if (!item) continue;
    records.push({
      id: placement.id,
      x: placement.x,
      y: placement.y,
      size: placement.size,
      captionY: placement.captionY,
      title: truncateTitle(stringField(item, 'caption') ?? ''),
      img: imageOverrides?.get(item.id) ?? stringField(item, 'img'),
      url: stringField(item, 'url'),
    });
  }

  return {
    resolution: layout.resolution,
    layout: {
      baseSize: layout.baseSize,
      minSize: layout.minSize,
      spacing: layout.spacing,
      cellSize: layout.cellSize,
    },
    placements: records,
  };
}
