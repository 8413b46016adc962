import { ParameterizedQuery } from '../../types';

/**
 * Boundary to the external geometry conversion tool.
 */
export interface GeometryConverter {
  /**
   * Load the shapefile found in `sourceDir` into `stagingRelation`,
   * replacing whatever the relation held.
   */
  importToStaging(sourceDir: string, stagingRelation: string): Promise<void>;

  /**
   * Write the rows selected by `query` as a shapefile set into `destDir`.
   * Resolves with the path of the `.shp` the tool was asked to produce.
   */
  exportFromQuery(query: ParameterizedQuery, destDir: string): Promise<string>;
}
