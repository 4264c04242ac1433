/**
 * This is a global config object used to store the configuration of the tile pipeline.
 * Only serializable data should be stored in it.
 */
type Config = {
    /**
     * Consecutive path points closer than this distance (in tile units) are merged
     * before tessellation.
     */
    TESSELLATION_TOLERANCE: number;
    /**
     * Polygons with more rings than this are truncated to their largest rings.
     */
    EARCUT_MAX_RINGS: number;
    /**
     * Length of the extrusion normal written for stroke vertices.
     */
    LINE_HALF_WIDTH: number;
};

export const config: Config = {
    TESSELLATION_TOLERANCE: 0.02,
    EARCUT_MAX_RINGS: 500,
    LINE_HALF_WIDTH: 0.5
};
