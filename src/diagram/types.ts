export interface DiagramOptions {
  /**
   * Draw one generic trunk and arrow row per side instead of labelled
   * connectors. Edges are ignored.
   */
  simple?: boolean;
}
