import type { ConfigIssue } from "./config";
import { parseNavigationConfig } from "./config";
import type { InputDispatcherOptions } from "./input-dispatcher";
import { InputDispatcher } from "./input-dispatcher";
import { silentLogger } from "./logger";

export { BoxManager } from "./box-manager";
export type { BoxContext } from "./box-manager";
export { createBox, createModal, supportsEditing } from "./boxes";
export type {
  Box,
  BoxSpec,
  DataTableBox,
  ListViewBox,
  ModalBox,
  ModalSpec,
  TextInputBox,
  TreeViewBox,
} from "./boxes";
export { CompletionQueue } from "./completion-queue";
export type {
  Completion,
  QueryResult,
  SchemaResult,
  TargetLocation,
} from "./completion-queue";
export { DEFAULT_NAVIGATION_CONFIG, parseNavigationConfig } from "./config";
export type { ConfigIssue, NavigationConfig } from "./config";
export { buildKeyMapping, createDefaultKeyMapping } from "./default-key-mapping";
export { NONE } from "./effects";
export type { Effect, ErrorSource, QuerySpec } from "./effects";
export { InputDispatcher } from "./input-dispatcher";
export type { InputDispatcherOptions } from "./input-dispatcher";
export { findCollisions, mergeKeyMappings } from "./key-mapping";
export type {
  KeyCollision,
  KeyMapping,
  KeyMappingOverlay,
  KeyTable,
  KeyTableOverlay,
} from "./key-mapping";
export { KeyResolver, MAX_COUNT } from "./key-resolver";
export { BOX_IDS, DEFAULT_LAYOUT, findNeighbor } from "./layout";
export type { Layout, PaneLayout } from "./layout";
export { ListModel } from "./list-model";
export { createLineLogger, silentLogger } from "./logger";
export type { LogLevel, Logger } from "./logger";
export { NavigationManager } from "./navigation-manager";
export { RequestTracker } from "./request-tracker";
export { TableModel } from "./table-model";
export type { CellRef, TableData } from "./table-model";
export { NAVIGATION_ACTIONS } from "./types";
export type * from "./types";
export { makeChord, parseChord } from "./utils";
export { VimEditor } from "./vim-editor";
export type { EditResult } from "./vim-editor";
export { YankRegister } from "./yank-register";

/**
 * Builds a dispatcher from a configuration object the application has already
 * loaded. Configuration problems are logged and returned alongside.
 */
export const createNavigationCore = (
  rawConfig: unknown,
  options: Omit<InputDispatcherOptions, "config"> = {},
): { dispatcher: InputDispatcher; issues: ConfigIssue[] } => {
  const logger = options.logger ?? silentLogger;
  const { config, issues } = parseNavigationConfig(rawConfig);
  for (const issue of issues) {
    logger.warn(`config ${issue.path || "(root)"}: ${issue.message}`);
  }
  return { dispatcher: new InputDispatcher({ ...options, config }), issues };
};
