import { z } from 'zod';
import { ConfigurationError } from './errors';
import { validateResolutions } from './spatial-grid';
import { validateLayoutOptions } from './layout';
import { DEFAULT_DISPLAY_FIELDS } from './exporter';

// ==========================================
// SCHEMA
// ==========================================

const MapConfigSchema = z.object({
  input: z.string().min(1, 'input path is required'),
  outputDir: z.string().min(1, 'output directory is required'),
  resolutions: z.array(z.number().int().positive()).min(1),
  /** Fraction of each axis' extent added as padding on both sides */
  margin: z.number().min(0).max(1),
  density: z.object({
    method: z.string().pipe(z.enum(['linear', 'log', 'percentile'])),
    percentile: z.number().gt(0).max(1),
  }),
  representative: z.object({
    strategy: z.string().pipe(z.enum(['center', 'densest'])),
    hierarchy: z.string().pipe(z.enum(['independent', 'propagate'])),
    denseThreshold: z.number().int().nonnegative(),
    miniGrid: z.number().int().positive(),
  }),
  layout: z.object({
    /** Defaults to the finest resolution */
    resolution: z.number().int().positive().optional(),
    baseSize: z.number().positive(),
    minSize: z.number().positive(),
    spacing: z.number().nonnegative(),
    cellSize: z.number().positive(),
    captionOffset: z.number().nonnegative(),
    minDensity: z.number().min(0).max(1),
  }),
  export: z.object({
    /** Subset to export; all configured resolutions when absent */
    resolutions: z.array(z.number().int().positive()).optional(),
    displayFields: z.array(z.string().min(1)),
    examplesPerCell: z.number().int().nonnegative(),
    maxDocumentBytes: z.number().int().positive(),
    placementsInViewer: z.boolean(),
  }),
  thumbnails: z.object({
    enabled: z.boolean(),
    /** Metadata field holding a local image path */
    sourceField: z.string().min(1),
    maxSize: z.number().int().positive(),
    quality: z.number().int().min(1).max(100),
  }),
  concurrency: z.number().int().min(1).max(64),
  maxRetries: z.number().int().min(0).max(10),
  verbose: z.boolean(),
});

export type RawMapConfig = z.input<typeof MapConfigSchema>;

type ParsedMapConfig = z.output<typeof MapConfigSchema>;

export type MapConfig = Omit<ParsedMapConfig, 'layout'> & {
  layout: Omit<ParsedMapConfig['layout'], 'resolution'> & { resolution: number };
};

// ==========================================
// DEFAULTS
// ==========================================

type Env = Record<string, string | undefined>;

function envFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  return value === '1' || value === 'true' || value === 'yes';
}

export function parseNumberList(value: string): number[] {
  return value
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean)
    .map(Number);
}

export function defaultsFromEnv(env: Env = process.env): RawMapConfig {
  return {
    input: env.MAP_INPUT || 'data/projection/points.jsonl',
    outputDir: env.MAP_OUTPUT_DIR || 'data/export',
    resolutions: parseNumberList(env.MAP_RESOLUTIONS || '64,128,256'),
    margin: Number(env.MAP_MARGIN || 0),
    density: {
      method: env.DENSITY_METHOD || 'linear',
      percentile: Number(env.DENSITY_PERCENTILE || 0.95),
    },
    representative: {
      strategy: env.REPRESENTATIVE_STRATEGY || 'center',
      hierarchy: env.REPRESENTATIVE_HIERARCHY || 'independent',
      denseThreshold: Number(env.DENSE_THRESHOLD || 50),
      miniGrid: Number(env.MINI_GRID_SIZE || 10),
    },
    layout: {
      resolution: env.LAYOUT_RESOLUTION ? Number(env.LAYOUT_RESOLUTION) : undefined,
      baseSize: Number(env.LAYOUT_BASE_SIZE || 400),
      minSize: Number(env.LAYOUT_MIN_SIZE || 100),
      spacing: Number(env.LAYOUT_SPACING || 50),
      cellSize: Number(env.LAYOUT_CELL_SIZE || 450),
      captionOffset: Number(env.LAYOUT_CAPTION_OFFSET || 20),
      minDensity: Number(env.LAYOUT_MIN_DENSITY || 0),
    },
    export: {
      resolutions: undefined,
      displayFields: env.DISPLAY_FIELDS ? env.DISPLAY_FIELDS.split(',').map((f) => f.trim()).filter(Boolean) : [...DEFAULT_DISPLAY_FIELDS],
      examplesPerCell: Number(env.EXAMPLES_PER_CELL || 100),
      maxDocumentBytes: Math.round(Number(env.MAX_DOCUMENT_MB || 50) * 1024 * 1024),
      placementsInViewer: envFlag(env.VIEWER_PLACEMENTS, false),
    },
    thumbnails: {
      enabled: envFlag(env.THUMBNAILS, false),
      sourceField: env.THUMBNAIL_SOURCE_FIELD || 'image',
      maxSize: Number(env.THUMBNAIL_SIZE || 512),
      quality: Number(env.THUMBNAIL_QUALITY || 85),
    },
    concurrency: Number(env.CONCURRENCY || 4),
    maxRetries: Number(env.WRITE_RETRIES || 3),
    verbose: envFlag(env.DEBUG_PIPELINE, false),
  };
}

// ==========================================
// CLI
// ==========================================

export const CLI_USAGE = `
Usage: npx tsx scripts/build-map.ts [options]

Builds the multi-resolution grid map, density scores and board layout from a
table of projected points (.json array or .jsonl rows with id, x, y, metadata).

Options:
  -i, --input <path>            Projected points file
  -o, --output <dir>            Output directory
      --resolutions <list>      Grid sizes, coarse to fine (e.g. 64,128,256)
      --only <list>             Export only these resolutions
      --margin <fraction>       Bounding-box padding per axis (0-1)
      --density <method>        linear | log | percentile
      --percentile <q>          Quantile for percentile normalization (0-1]
      --strategy <name>         Representative choice: center | densest
      --hierarchy <mode>        independent | propagate
      --layout-resolution <n>   Grid the board layout snaps to (default: finest)
      --base-size <n>           Size of the densest item on the board
      --min-size <n>            Size floor on the board
      --spacing <n>             Minimum gap between board items
      --cell-size <n>           Board units per grid cell
      --min-density <q>         Leave out board cells below this density (0-1)
      --examples <n>            Example items listed per cell (0 disables)
      --max-document-mb <n>     Split viewer documents above this size
      --viewer-placements       Include board placements in viewer documents
      --thumbnails              Generate WEBP thumbnails for representatives
      --no-thumbnails           Skip thumbnails
      --thumbnail-size <px>     Longest thumbnail side
      --concurrency <n>         Parallel file operations
      --verbose                 Log per-stage progress
  -h, --help                    Show help
`;

export type CliResult = {
  config: RawMapConfig;
  help: boolean;
  /** Unrecognized flags, reported by the caller */
  ignored: string[];
};

function requireValue(args: readonly string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (!value || value.startsWith('-')) {
    throw new ConfigurationError([`missing value for ${flag}`]);
  }
  return value;
}

/**
 * Applies CLI flags on top of `base` (usually the env defaults). Values are
 * validated afterwards by `resolveConfig`.
 */
export function applyCliArgs(args: readonly string[], base: RawMapConfig): CliResult {
  const config: RawMapConfig = structuredClone(base);
  const ignored: string[] = [];
  let help = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '-i':
      case '--input':
        config.input = requireValue(args, i, arg);
        i++;
        break;
      case '-o':
      case '--output':
        config.outputDir = requireValue(args, i, arg);
        i++;
        break;
      case '--resolutions':
        config.resolutions = parseNumberList(requireValue(args, i, arg));
        i++;
        break;
      case '--only':
        config.export.resolutions = parseNumberList(requireValue(args, i, arg));
        i++;
        break;
      case '--margin':
        config.margin = Number(requireValue(args, i, arg));
        i++;
        break;
      case '--density':
        config.density.method = requireValue(args, i, arg);
        i++;
        break;
      case '--percentile':
        config.density.percentile = Number(requireValue(args, i, arg));
        i++;
        break;
      case '--strategy':
        config.representative.strategy = requireValue(args, i, arg);
        i++;
        break;
      case '--hierarchy':
        config.representative.hierarchy = requireValue(args, i, arg);
        i++;
        break;
      case '--layout-resolution':
        config.layout.resolution = Number(requireValue(args, i, arg));
        i++;
        break;
      case '--base-size':
        config.layout.baseSize = Number(requireValue(args, i, arg));
        i++;
        break;
      case '--min-size':
        config.layout.minSize = Number(requireValue(args, i, arg));
        i++;
        break;
      case '--spacing':
        config.layout.spacing = Number(requireValue(args, i, arg));
        i++;
        break;
      case '--cell-size':
        config.layout.cellSize = Number(requireValue(args, i, arg));
        i++;
        break;
      case '--min-density':
        config.layout.minDensity = Number(requireValue(args, i, arg));
        i++;
        break;
      case '--examples':
        config.export.examplesPerCell = Number(requireValue(args, i, arg));
        i++;
        break;
      case '--max-document-mb':
        config.export.maxDocumentBytes = Math.round(Number(requireValue(args, i, arg)) * 1024 * 1024);
        i++;
        break;
      case '--viewer-placements':
        config.export.placementsInViewer = true;
        break;
      case '--thumbnails':
        config.thumbnails.enabled = true;
        break;
      case '--no-thumbnails':
        config.thumbnails.enabled = false;
        break;
      case '--thumbnail-size':
        config.thumbnails.maxSize = Number(requireValue(args, i, arg));
        i++;
        break;
      case '--concurrency':
        config.concurrency = Number(requireValue(args, i, arg));
        i++;
        break;
      case '--verbose':
        config.verbose = true;
        break;
      case '-h':
      case '--help':
        help = true;
        break;
      default:
        ignored.push(arg);
    }
  }

  return { config, help, ignored };
}

// ==========================================
// VALIDATION
// ==========================================

/**
 * Shape check with zod, then the cross-field rules: resolution refinement,
 * layout fit and export subset. Runs before any computation.
 */
export function resolveConfig(raw: unknown): MapConfig {
  const parsed = MapConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    );
  }

  const data = parsed.data;
  const issues = validateResolutions(data.resolutions);
  const finest = data.resolutions[data.resolutions.length - 1];
  const layoutResolution = data.layout.resolution ?? finest;

  if (!data.resolutions.includes(layoutResolution)) {
    issues.push(`layout resolution ${layoutResolution} is not one of ${data.resolutions.join(', ')}`);
  }
  for (const r of data.export.resolutions ?? []) {
    if (!data.resolutions.includes(r)) issues.push(`export resolution ${r} is not one of ${data.resolutions.join(', ')}`);
  }

  const layout = { ...data.layout, resolution: layoutResolution };
  issues.push(...validateLayoutOptions(layout));

  if (issues.length > 0) throw new ConfigurationError(issues);
  return { ...data, layout };
}

export function loadConfig(args: readonly string[], env: Env = process.env): { config: MapConfig; help: boolean; ignored: string[] } {
  const cli = applyCliArgs(args, defaultsFromEnv(env));
  if (cli.help) {
    // Help must not fail on an otherwise invalid environment
    return { config: resolveConfig(defaultsFromEnv({})), help: true, ignored: cli.ignored };
  }
  return { config: resolveConfig(cli.config), help: false, ignored: cli.ignored };
}
