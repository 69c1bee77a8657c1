/**
 * IModuleProvider - Supplies the modules to scan
 *
 * Stands at the decompiler boundary: whatever produces parseable plugin
 * source hands it to the scanner through this interface.
 *
 * @module
 */

/**
 * One unit of parseable source.
 */
export interface ModuleSource {
  /** Display name used in warnings and statistics */
  name: string;
  /** Virtual or real file name; its extension selects the script kind */
  fileName: string;
  /** Source text */
  text: string;
}

/**
 * Modules plus the framework declarations they are checked against.
 */
export interface ModuleSet {
  /** Modules in processing order */
  modules: ModuleSource[];
  /** Ambient declaration files shared by every module */
  declarations: ModuleSource[];
}

export interface IModuleProvider {
  /**
   * Loads the module set.
   * @throws ParsingError if the source location does not exist
   */
  load(): Promise<ModuleSet>;
}
