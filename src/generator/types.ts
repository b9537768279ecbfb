export type ModelStyle = "immutable" | "valueEquality" | "plain";

export type StateStyle = "reactive" | "eventDriven";

export type EntityNames = {
  pascal: string;
  camel: string;
  snake: string;
};

export type RenderContext = {
  names: EntityNames;
  model: ModelStyle;
  state: StateStyle;
  author: string;
};

export type ArtifactKind =
  | "entity"
  | "model"
  | "repositoryInterface"
  | "repositoryImpl"
  | "dataSource"
  | "useCase"
  | "controller"
  | "blocEvent"
  | "blocState"
  | "page"
  | "binding";

export type ScreenArtifactKind = "page" | "binding" | "controller" | "blocEvent" | "blocState";

export type Operation = "feature" | "screen" | "model" | "usecase" | "repository";

/** Relative posix paths; `files` keeps insertion order, which is also the write order. */
export type FileSet = {
  root: string;
  directories: string[];
  files: Record<string, string>;
};

export type PlanActionType = "CREATE" | "OVERWRITE" | "SKIP";

export type DirAction = {
  type: Exclude<PlanActionType, "OVERWRITE">;
  path: string;
  entryType: "dir";
  reason: string;
};

export type FileAction = {
  type: Exclude<PlanActionType, "SKIP">;
  path: string;
  entryType: "file";
  reason: string;
  content: string;
};

export type PlanAction = DirAction | FileAction;

export type Plan = {
  operation: Operation;
  entityName: string;
  rootDir: string;
  actions: PlanAction[];
};

export type GenerationErrorCode = "INVALID_NAME" | "IO_FAILURE" | "OUTSIDE_ROOT";

export type GenerationError = {
  code: GenerationErrorCode;
  message: string;
  path?: string;
  detail?: string;
};

export type GenerateResult =
  | { ok: true; operation: Operation; entityName: string; paths: string[]; plan: Plan; applied: boolean }
  | { ok: false; operation: Operation; entityName: string; error: GenerationError };
