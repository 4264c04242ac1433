/**
 * The extent of the tile coordinate system used by vector tiles. Feature geometry is
 * tessellated in these units without normalization, so the full-tile background quad
 * spans `[0, EXTENT]` on both axes.
 */
export const EXTENT = 4096;
