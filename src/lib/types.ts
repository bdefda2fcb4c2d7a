export type ItemMetadata = Readonly<Record<string, unknown>>;

export type MapItem = {
  id: string;
  x: number;
  y: number;
  metadata: ItemMetadata;
};

export type Bounds = {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
};

/** "col,row": x index first, as the viewer reads it */
export type CellKey = string;

export type GridLevel = {
  resolution: number;
  /** Populated cells only; member ids sorted */
  cells: ReadonlyMap<CellKey, readonly string[]>;
};

export type GridIndex = {
  /** null when there are no items */
  bounds: Bounds | null;
  /** Ascending by resolution */
  levels: readonly GridLevel[];
};

export type RepresentativeMap = ReadonlyMap<CellKey, string>;

export type RepresentativeLevels = ReadonlyMap<number, RepresentativeMap>;

export type DensityScores = ReadonlyMap<string, number>;

export type Placement = {
  id: string;
  cellKey: CellKey;
  x: number;
  y: number;
  size: number;
  captionY: number;
};

export type DensityMethod = 'linear' | 'log' | 'percentile';
export type RepresentativeStrategy = 'center' | 'densest';
export type HierarchyMode = 'independent' | 'propagate';

export type ViewerExample = {
  id: string;
  [field: string]: unknown;
};

export type ViewerCell = {
  id: string;
  count: number;
  examples?: ViewerExample[];
  placement?: { x: number; y: number; size: number };
  [field: string]: unknown;
};

export type ViewerDocument = Record<CellKey, ViewerCell>;

export type PlacementRecord = {
  id: string;
  x: number;
  y: number;
  size: number;
  captionY: number;
  title: string;
  img: string | null;
  url: string | null;
};

export type PlacementExport = {
  resolution: number;
  layout: {
    baseSize: number;
    minSize: number;
    spacing: number;
    cellSize: number;
  };
  placements: PlacementRecord[];
};

export type ManifestLevel = {
  resolution: number;
  cells: number;
  files: string[];
};

export type MapManifest = {
  generated_at: string;
  items: number;
  bounds: Bounds | null;
  levels: ManifestLevel[];
  placements: string | null;
};
