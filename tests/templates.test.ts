import { describe, expect, test } from "vitest";
import { renderArtifact, renderScreenArtifact } from "../src/generator/catalog.js";
import { createRenderContext, resolveModelStyle } from "../src/generator/context.js";
import { DEFAULT_CONFIG, type Configuration } from "../src/config/schema.js";

const withConfig = (overrides: Partial<Configuration>): Configuration => ({ ...DEFAULT_CONFIG, ...overrides });

const valueEquality = withConfig({ useImmutableModels: false, useValueEquality: true });
const plain = withConfig({ useImmutableModels: false, useValueEquality: false });
const bloc = withConfig({ defaultStateManager: "bloc" });

describe("render context", () => {
  test("resolves model style with immutable taking precedence", () => {
    expect(resolveModelStyle(withConfig({ useImmutableModels: true, useValueEquality: true }))).toBe("immutable");
    expect(resolveModelStyle(valueEquality)).toBe("valueEquality");
    expect(resolveModelStyle(plain)).toBe("plain");
  });

  test("derives all casing forms once", () => {
    expect(createRenderContext("user profile", bloc)).toEqual({
      names: { pascal: "UserProfile", camel: "userProfile", snake: "user_profile" },
      model: "immutable",
      state: "eventDriven",
      author: "Developer"
    });
  });
});

describe("entity and model templates", () => {
  test("immutable family uses freezed and never equatable", () => {
    const entity = renderArtifact("entity", "user_profile", withConfig({ useValueEquality: true }));
    const model = renderArtifact("model", "user_profile", withConfig({ useValueEquality: true }));

    expect(entity).toContain("part 'user_profile_entity.freezed.dart';");
    expect(entity).toContain("class UserProfileEntity with _$UserProfileEntity {");
    expect(model).toContain("part 'user_profile_model.g.dart';");
    expect(model).toContain("factory UserProfileModel.fromJson(Map<String, dynamic> json) => _$UserProfileModelFromJson(json);");
    expect(entity.toLowerCase()).not.toContain("equatable");
    expect(model.toLowerCase()).not.toContain("equatable");
  });

  test("value-equality family uses equatable and never freezed", () => {
    const entity = renderArtifact("entity", "user_profile", valueEquality);
    const model = renderArtifact("model", "user_profile", valueEquality);

    expect(entity).toContain("class UserProfileEntity extends Equatable {");
    expect(entity).toContain("  List<Object?> get props => [id];");
    expect(model).toContain("class UserProfileModel extends Equatable {");
    expect(model).toContain("  UserProfileEntity toEntity() {");
    expect(entity.toLowerCase()).not.toContain("freezed");
    expect(model.toLowerCase()).not.toContain("freezed");
  });

  test("plain family uses neither helper", () => {
    const entity = renderArtifact("entity", "auth", plain);
    const model = renderArtifact("model", "auth", plain);

    expect(entity).toBe(
      [
        "/// Author: Developer",
        "class AuthEntity {",
        "  const AuthEntity({",
        "    required this.id,",
        "    // Add your entity properties here",
        "  });",
        "",
        "  final String id;",
        "}",
        ""
      ].join("\n")
    );
    expect(model).toContain("class AuthModel extends AuthEntity {");
    for (const text of [entity, model]) {
      expect(text.toLowerCase()).not.toContain("freezed");
      expect(text.toLowerCase()).not.toContain("equatable");
    }
  });

  test("carries the configured author", () => {
    expect(renderArtifact("model", "auth", withConfig({ author: "Ada" }))).toContain("/// Author: Ada\n@freezed\n");
  });
});

describe("domain and data templates", () => {
  test("repository interface is fully rendered", () => {
    expect(renderArtifact("repositoryInterface", "auth", DEFAULT_CONFIG)).toBe(
      [
        "import '../entities/auth_entity.dart';",
        "",
        "abstract class AuthRepository {",
        "  Future<List<AuthEntity>> getAll();",
        "  Future<AuthEntity?> getById(String id);",
        "  Future<AuthEntity> create(AuthEntity entity);",
        "  Future<AuthEntity> update(AuthEntity entity);",
        "  Future<void> delete(String id);",
        "}",
        ""
      ].join("\n")
    );
  });

  test("repository implementation imports the conventional paths", () => {
    const impl = renderArtifact("repositoryImpl", "user_profile", DEFAULT_CONFIG);

    expect(impl).toContain("import '../../domain/repositories/user_profile_repository.dart';");
    expect(impl).toContain("import '../datasources/user_profile_remote_data_source.dart';");
    expect(impl).toContain("class UserProfileRepositoryImpl implements UserProfileRepository {");
  });

  test("data source stubs every method", () => {
    const source = renderArtifact("dataSource", "auth", DEFAULT_CONFIG);

    expect(source).toContain("class AuthRemoteDataSourceImpl implements AuthRemoteDataSource {");
    expect(source).toContain("    throw UnimplementedError('getById() not implemented');");
    expect(source).toContain("    throw UnimplementedError('delete() not implemented');");
  });

  test("use case calls the repository", () => {
    expect(renderArtifact("useCase", "user_profile", DEFAULT_CONFIG)).toContain(
      "  const UserProfileUseCase(this._repository);"
    );
  });
});

describe("presentation templates", () => {
  test("reactive style renders a GetX controller, view and binding", () => {
    const controller = renderArtifact("controller", "user_profile", DEFAULT_CONFIG);
    const page = renderArtifact("page", "user_profile", DEFAULT_CONFIG);
    const binding = renderArtifact("binding", "user_profile", DEFAULT_CONFIG);

    expect(controller).toContain("class UserProfileController extends GetxController {");
    expect(controller).toContain("  final UserProfileUseCase _userProfileUseCase;");
    expect(controller).toContain("Get.snackbar('Error', 'Failed to load userProfiles: $e');");
    expect(page).toContain("class UserProfilePage extends GetView<UserProfileController> {");
    expect(page).toContain("itemCount: controller.userProfileList.length,");
    expect(binding).toContain("import '../controllers/user_profile_controller.dart';");
    expect(binding).toContain("    Get.lazyPut<UserProfileController>(");
  });

  test("event-driven style renders bloc, events, states, page and provider", () => {
    const blocText = renderArtifact("controller", "auth", bloc);
    const events = renderArtifact("blocEvent", "auth", bloc);
    const states = renderArtifact("blocState", "auth", bloc);
    const page = renderArtifact("page", "auth", bloc);
    const provider = renderArtifact("binding", "auth", bloc);

    expect(blocText).toContain("class AuthBloc extends Bloc<AuthEvent, AuthState> {");
    expect(blocText).toContain("part 'auth_event.dart';\npart 'auth_state.dart';");
    expect(blocText).toContain("    on<RefreshAuths>(_onRefreshAuths);");
    expect(events).toContain("class LoadAuths extends AuthEvent {");
    expect(states).toContain("  final List<AuthEntity> authList;");
    expect(page).toContain("Text('Error: ${state.message}'),");
    expect(provider).toContain("create: (context) => GetIt.instance<AuthBloc>()..add(const LoadAuths()),");
    expect(provider).not.toContain("GetxController");
  });
});

describe("screen templates", () => {
  test("reactive screen has no use case wiring", () => {
    const controller = renderScreenArtifact("controller", "login", DEFAULT_CONFIG);
    const binding = renderScreenArtifact("binding", "login", DEFAULT_CONFIG);

    expect(controller).toContain("class LoginController extends GetxController {");
    expect(controller).not.toContain("UseCase");
    expect(binding).toContain("      () => LoginController(),");
  });

  test("event-driven screen uses a started event", () => {
    const blocText = renderScreenArtifact("controller", "login", bloc);
    const page = renderScreenArtifact("page", "login", bloc);

    expect(blocText).toContain("    on<LoginStarted>(_onStarted);");
    expect(page).toContain("body: BlocBuilder<LoginBloc, LoginState>(");
    expect(renderScreenArtifact("binding", "login", bloc)).toContain("      () => LoginBloc(),");
  });
});

test("rendering is deterministic", () => {
  expect(renderArtifact("page", "user_profile", bloc)).toBe(renderArtifact("page", "user_profile", bloc));
});
