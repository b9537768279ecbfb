import type { RenderContext } from "../types.js";

const immutableEntity = ({ names, author }: RenderContext): string => `import 'package:freezed_annotation/freezed_annotation.dart';

part '${names.snake}_entity.freezed.dart';

/// Author: ${author}
@freezed
class ${names.pascal}Entity with _$${names.pascal}Entity {
  const factory ${names.pascal}Entity({
    required String id,
    // Add your entity properties here
  }) = _${names.pascal}Entity;
}
`;

const valueEqualityEntity = ({ names, author }: RenderContext): string => `import 'package:equatable/equatable.dart';

/// Author: ${author}
class ${names.pascal}Entity extends Equatable {
  const ${names.pascal}Entity({
    required this.id,
    // Add your entity properties here
  });

  final String id;

  @override
  List<Object?> get props => [id];
}
`;

const plainEntity = ({ names, author }: RenderContext): string => `/// Author: ${author}
class ${names.pascal}Entity {
  const ${names.pascal}Entity({
    required this.id,
    // Add your entity properties here
  });

  final String id;
}
`;

export const templateEntity = (ctx: RenderContext): string => {
  switch (ctx.model) {
    case "immutable":
      return immutableEntity(ctx);
    case "valueEquality":
      return valueEqualityEntity(ctx);
    case "plain":
      return plainEntity(ctx);
  }
};

export const templateRepositoryInterface = ({ names }: RenderContext): string => `import '../entities/${names.snake}_entity.dart';

abstract class ${names.pascal}Repository {
  Future<List<${names.pascal}Entity>> getAll();
  Future<${names.pascal}Entity?> getById(String id);
  Future<${names.pascal}Entity> create(${names.pascal}Entity entity);
  Future<${names.pascal}Entity> update(${names.pascal}Entity entity);
  Future<void> delete(String id);
}
`;

export const templateUseCase = ({ names }: RenderContext): string => `import '../entities/${names.snake}_entity.dart';
import '../repositories/${names.snake}_repository.dart';

class ${names.pascal}UseCase {
  const ${names.pascal}UseCase(this._repository);

  final ${names.pascal}Repository _repository;

  Future<List<${names.pascal}Entity>> call() async {
    return await _repository.getAll();
  }
}
`;
