import { renderScreenWithContext, renderWithContext } from "./catalog.js";
import type { FileSet, Operation, RenderContext } from "./types.js";

export const FEATURES_ROOT = "lib/features";
export const SHARED_ROOT = "lib/shared";

const stateDir = (ctx: RenderContext): string => (ctx.state === "eventDriven" ? "bloc" : "controllers");

export const featureRoot = (snake: string): string => `${FEATURES_ROOT}/${snake}`;

export const buildFeatureFileSet = (ctx: RenderContext): FileSet => {
  const { snake } = ctx.names;
  const root = featureRoot(snake);
  const state = `${root}/presentation/${stateDir(ctx)}`;

  const directories = [
    `${root}/data/datasources`,
    `${root}/data/models`,
    `${root}/data/repositories`,
    `${root}/domain/entities`,
    `${root}/domain/repositories`,
    `${root}/domain/usecases`,
    `${root}/presentation/pages`,
    `${root}/presentation/bindings`,
    state
  ];

  const files: Record<string, string> = {
    [`${root}/domain/entities/${snake}_entity.dart`]: renderWithContext("entity", ctx),
    [`${root}/data/models/${snake}_model.dart`]: renderWithContext("model", ctx),
    [`${root}/domain/repositories/${snake}_repository.dart`]: renderWithContext("repositoryInterface", ctx),
    [`${root}/data/repositories/${snake}_repository_impl.dart`]: renderWithContext("repositoryImpl", ctx),
    [`${root}/data/datasources/${snake}_remote_data_source.dart`]: renderWithContext("dataSource", ctx),
    [`${root}/domain/usecases/${snake}_usecase.dart`]: renderWithContext("useCase", ctx),
    [`${root}/presentation/pages/${snake}_page.dart`]: renderWithContext("page", ctx),
    [`${root}/presentation/bindings/${snake}_binding.dart`]: renderWithContext("binding", ctx)
  };

  if (ctx.state === "eventDriven") {
    files[`${state}/${snake}_bloc.dart`] = renderWithContext("controller", ctx);
    files[`${state}/${snake}_event.dart`] = renderWithContext("blocEvent", ctx);
    files[`${state}/${snake}_state.dart`] = renderWithContext("blocState", ctx);
  } else {
    files[`${state}/${snake}_controller.dart`] = renderWithContext("controller", ctx);
  }

  return { root, directories, files };
};

export const buildScreenFileSet = (ctx: RenderContext): FileSet => {
  const { snake } = ctx.names;
  const root = `${featureRoot(snake)}/presentation`;
  const state = `${root}/${stateDir(ctx)}`;

  const files: Record<string, string> = {
    [`${root}/pages/${snake}_page.dart`]: renderScreenWithContext("page", ctx),
    [`${root}/bindings/${snake}_binding.dart`]: renderScreenWithContext("binding", ctx)
  };

  if (ctx.state === "eventDriven") {
    files[`${state}/${snake}_bloc.dart`] = renderScreenWithContext("controller", ctx);
    files[`${state}/${snake}_event.dart`] = renderScreenWithContext("blocEvent", ctx);
    files[`${state}/${snake}_state.dart`] = renderScreenWithContext("blocState", ctx);
  } else {
    files[`${state}/${snake}_controller.dart`] = renderScreenWithContext("controller", ctx);
  }

  return { root, directories: [`${root}/pages`, `${root}/bindings`, state], files };
};

export const buildModelFileSet = (ctx: RenderContext): FileSet => {
  const root = `${SHARED_ROOT}/models`;
  return {
    root,
    directories: [root],
    files: { [`${root}/${ctx.names.snake}_model.dart`]: renderWithContext("model", ctx) }
  };
};

export const buildUseCaseFileSet = (ctx: RenderContext): FileSet => {
  const root = `${SHARED_ROOT}/usecases`;
  return {
    root,
    directories: [root],
    files: { [`${root}/${ctx.names.snake}_usecase.dart`]: renderWithContext("useCase", ctx) }
  };
};

export const buildRepositoryFileSet = (ctx: RenderContext): FileSet => {
  const root = `${SHARED_ROOT}/repositories`;
  const { snake } = ctx.names;
  return {
    root,
    directories: [root, `${root}/implementations`],
    files: {
      [`${root}/${snake}_repository.dart`]: renderWithContext("repositoryInterface", ctx),
      [`${root}/implementations/${snake}_repository_impl.dart`]: renderWithContext("repositoryImpl", ctx)
    }
  };
};

const fileSetBuilders: Record<Operation, (ctx: RenderContext) => FileSet> = {
  feature: buildFeatureFileSet,
  screen: buildScreenFileSet,
  model: buildModelFileSet,
  usecase: buildUseCaseFileSet,
  repository: buildRepositoryFileSet
};

export const buildFileSet = (operation: Operation, ctx: RenderContext): FileSet => fileSetBuilders[operation](ctx);
