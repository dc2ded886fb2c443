import type { ModalSpec } from "./boxes";
import { BoxManager } from "./box-manager";
import type {
  Completion,
  QueryResult,
  SchemaResult,
  TargetLocation,
} from "./completion-queue";
import { CompletionQueue } from "./completion-queue";
import type { NavigationConfig } from "./config";
import { DEFAULT_NAVIGATION_CONFIG } from "./config";
import { buildKeyMapping } from "./default-key-mapping";
import type { Effect, ErrorSource } from "./effects";
import { NONE, isNone } from "./effects";
import type { KeyCollision } from "./key-mapping";
import { KeyResolver } from "./key-resolver";
import type { Layout } from "./layout";
import { DEFAULT_LAYOUT } from "./layout";
import type { Logger } from "./logger";
import { silentLogger } from "./logger";
import { NavigationManager } from "./navigation-manager";
import { RequestTracker } from "./request-tracker";
import type {
  EditingMode,
  FocusSnapshot,
  KeyInput,
  NavigationAction,
  ResolveContext,
} from "./types";
import { YankRegister } from "./yank-register";

const REPEATABLE: ReadonlySet<NavigationAction> = new Set<NavigationAction>([
  "CursorLeft",
  "CursorRight",
  "CursorUp",
  "CursorDown",
  "CursorLineStart",
  "CursorLineEnd",
  "CursorNextWord",
  "CursorPreviousWord",
  "CursorFirstLine",
  "CursorLastLine",
  "DeleteChar",
  "DeleteCharBefore",
  "Undo",
  "Redo",
  "Paste",
]);

export interface InputDispatcherOptions {
  config?: NavigationConfig;
  layout?: Layout;
  logger?: Logger;
}

export class InputDispatcher {
  private resolver: KeyResolver;
  private register = new YankRegister();
  private boxes: BoxManager;
  private navigation: NavigationManager;
  private requests = new RequestTracker();
  private completions = new CompletionQueue();
  private logger: Logger;
  private editingMode: EditingMode;
  private collisions: KeyCollision[];

  constructor(options: InputDispatcherOptions = {}) {
    const config = options.config ?? DEFAULT_NAVIGATION_CONFIG;
    const layout = options.layout ?? DEFAULT_LAYOUT;
    this.logger = options.logger ?? silentLogger;
    this.editingMode = config.defaultEditingMode;

    const { mapping, collisions } = buildKeyMapping(config.keymap, config.paneModifier);
    this.collisions = collisions;
    for (const collision of collisions) {
      this.logger.warn(
        `${collision.scope} binds ${collision.chord} to ${collision.kept}, shadowing ${collision.shadowed}`,
      );
    }

    this.resolver = new KeyResolver(mapping);
    this.boxes = new BoxManager(
      layout,
      this.register,
      config.defaultEditingMode,
      this.logger,
    );
    this.navigation = new NavigationManager(layout, this.boxes, this.requests, {
      defaultPane: config.defaultPane,
      logger: this.logger,
    });
  }

  public getRegister(): YankRegister {
    return this.register;
  }

  public getBoxManager(): BoxManager {
    return this.boxes;
  }

  public getCollisions(): readonly KeyCollision[] {
    return this.collisions;
  }

  public getPendingCount(): string {
    return this.resolver.getPendingCount();
  }

  public currentFocus(): FocusSnapshot {
    return this.navigation.currentFocus();
  }

  public handleKey(event: KeyInput): Effect {
    const resolved = this.resolver.resolve(event, this.resolveContext());
    if (!resolved) return NONE;

    const repeat = REPEATABLE.has(resolved.action) ? resolved.count : 1;
    let result = NONE;
    for (let i = 0; i < repeat; i += 1) {
      const effect = this.route(resolved.action, resolved.text);
      // a repetition that changes nothing means the rest would not either
      if (isNone(effect)) break;
      result = effect;
    }
    return result;
  }

  public pushModal(spec: ModalSpec): Effect {
    this.resolver.reset();
    return this.navigation.pushModal(spec);
  }

  public setConnections(names: string[]): Effect {
    return this.navigation.setConnections(names);
  }

  public onQueryComplete(requestId: number, result: QueryResult | Error): void {
    this.completions.post({ kind: "query", requestId, result });
  }

  public onLookupComplete(requestId: number, result: TargetLocation | Error): void {
    this.completions.post({ kind: "lookup", requestId, result });
  }

  public onSchemaComplete(requestId: number, result: SchemaResult | Error): void {
    this.completions.post({ kind: "schema", requestId, result });
  }

  public drainCompletions(): Effect[] {
    const effects: Effect[] = [];
    for (const completion of this.completions.drain()) {
      if (!this.requests.settle(completion.kind, completion.requestId)) {
        this.logger.debug(
          `dropping stale ${completion.kind} completion ${completion.requestId}`,
        );
        continue;
      }
      effects.push(this.applyCompletion(completion));
    }
    return effects;
  }

  private applyCompletion(completion: Completion): Effect {
    switch (completion.kind) {
      case "query":
        return completion.result instanceof Error
          ? this.failure("query", completion.result)
          : this.navigation.applyQueryResult(completion.result);
      case "lookup":
        return completion.result instanceof Error
          ? this.failure("lookup", completion.result)
          : this.navigation.applyLookup(completion.result);
      case "schema":
        return completion.result instanceof Error
          ? this.failure("schema", completion.result)
          : this.navigation.applySchema(completion.result);
    }
  }

  private failure(source: ErrorSource, error: Error): Effect {
    this.logger.error(`${source} failed: ${error.message}`);
    return { type: "Error", source, message: error.message };
  }

  private route(action: NavigationAction, text: string | null): Effect {
    const box = this.navigation.targetBox();
    if (box) {
      const effect = this.boxes.dispatch(action, text, box);
      if (effect) return effect;
    }
    return this.navigation.dispatch(action);
  }

  private resolveContext(): ResolveContext {
    const focus = this.navigation.currentFocus();
    const box = this.navigation.targetBox();
    const context = box ? this.boxes.context(box) : null;
    return {
      pane: focus.pane,
      box: focus.box,
      editingMode: context?.editingMode ?? this.editingMode,
      vimMode: context ? context.vimMode : this.editingMode === "vim" ? "normal" : null,
      viewMode: context?.viewMode ?? true,
      awaitingChar: context?.awaitingChar ?? false,
    };
  }
}
