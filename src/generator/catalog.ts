import type { Configuration } from "../config/schema.js";
import { createRenderContext } from "./context.js";
import { templateDataSource, templateModel, templateRepositoryImpl } from "./data/templatesData.js";
import { templateEntity, templateRepositoryInterface, templateUseCase } from "./domain/templatesDomain.js";
import {
  templateBloc,
  templateBlocEvent,
  templateBlocPage,
  templateBlocProvider,
  templateBlocState
} from "./presentation/templatesBloc.js";
import { templateGetxBinding, templateGetxController, templateGetxPage } from "./presentation/templatesGetx.js";
import {
  templateScreenBinding,
  templateScreenBloc,
  templateScreenBlocEvent,
  templateScreenBlocState,
  templateScreenController,
  templateScreenPage
} from "./presentation/templatesScreen.js";
import type { ArtifactKind, RenderContext, ScreenArtifactKind } from "./types.js";

type Template = (ctx: RenderContext) => string;

const byStateStyle =
  (reactive: Template, eventDriven: Template): Template =>
  (ctx) =>
    ctx.state === "eventDriven" ? eventDriven(ctx) : reactive(ctx);

const featureTemplates: Record<ArtifactKind, Template> = {
  entity: templateEntity,
  model: templateModel,
  repositoryInterface: templateRepositoryInterface,
  repositoryImpl: templateRepositoryImpl,
  dataSource: templateDataSource,
  useCase: templateUseCase,
  controller: byStateStyle(templateGetxController, templateBloc),
  blocEvent: templateBlocEvent,
  blocState: templateBlocState,
  page: byStateStyle(templateGetxPage, templateBlocPage),
  binding: byStateStyle(templateGetxBinding, templateBlocProvider)
};

const screenTemplates: Record<ScreenArtifactKind, Template> = {
  page: templateScreenPage,
  binding: templateScreenBinding,
  controller: byStateStyle(templateScreenController, templateScreenBloc),
  blocEvent: templateScreenBlocEvent,
  blocState: templateScreenBlocState
};

export const renderWithContext = (kind: ArtifactKind, ctx: RenderContext): string => featureTemplates[kind](ctx);

export const renderScreenWithContext = (kind: ScreenArtifactKind, ctx: RenderContext): string =>
  screenTemplates[kind](ctx);

/** Renders one artifact of the full feature family. Pure; never fails for a non-empty name. */
export const renderArtifact = (kind: ArtifactKind, entityName: string, config: Configuration): string =>
  renderWithContext(kind, createRenderContext(entityName, config));

export const renderScreenArtifact = (kind: ScreenArtifactKind, entityName: string, config: Configuration): string =>
  renderScreenWithContext(kind, createRenderContext(entityName, config));
