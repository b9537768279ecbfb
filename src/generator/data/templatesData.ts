import type { RenderContext } from "../types.js";

const immutableModel = ({ names, author }: RenderContext): string => `import 'package:freezed_annotation/freezed_annotation.dart';
import '../../domain/entities/${names.snake}_entity.dart';

part '${names.snake}_model.freezed.dart';
part '${names.snake}_model.g.dart';

/// Author: ${author}
@freezed
class ${names.pascal}Model with _$${names.pascal}Model {
  const factory ${names.pascal}Model({
    required String id,
    // Add your model properties here
  }) = _${names.pascal}Model;

  factory ${names.pascal}Model.fromJson(Map<String, dynamic> json) => _$${names.pascal}ModelFromJson(json);
}

extension ${names.pascal}ModelX on ${names.pascal}Model {
  ${names.pascal}Entity toEntity() {
    return ${names.pascal}Entity(
      id: id,
      // Map your properties here
    );
  }
}
`;

const valueEqualityModel = ({ names, author }: RenderContext): string => `import 'dart:convert';
import 'package:equatable/equatable.dart';
import '../../domain/entities/${names.snake}_entity.dart';

/// Author: ${author}
class ${names.pascal}Model extends Equatable {
  const ${names.pascal}Model({
    required this.id,
    // Add your model properties here
  });

  final String id;

  factory ${names.pascal}Model.fromJson(Map<String, dynamic> json) {
    return ${names.pascal}Model(
      id: json['id'] ?? '',
      // Map your JSON properties here
    );
  }

  factory ${names.pascal}Model.fromRawJson(String str) =>
      ${names.pascal}Model.fromJson(json.decode(str));

  Map<String, dynamic> toJson() {
    return {
      'id': id,
      // Map your properties here
    };
  }

  String toRawJson() => json.encode(toJson());

  ${names.pascal}Entity toEntity() {
    return ${names.pascal}Entity(
      id: id,
      // Map your properties here
    );
  }

  @override
  List<Object?> get props => [id];
}
`;

const plainModel = ({ names, author }: RenderContext): string => `import 'dart:convert';
import '../../domain/entities/${names.snake}_entity.dart';

/// Author: ${author}
class ${names.pascal}Model extends ${names.pascal}Entity {
  const ${names.pascal}Model({
    required super.id,
    // Add your model properties here
  });

  factory ${names.pascal}Model.fromJson(Map<String, dynamic> json) {
    return ${names.pascal}Model(
      id: json['id'] ?? '',
      // Map your JSON properties here
    );
  }

  factory ${names.pascal}Model.fromRawJson(String str) =>
      ${names.pascal}Model.fromJson(json.decode(str));

  Map<String, dynamic> toJson() {
    return {
      'id': id,
      // Map your properties here
    };
  }

  String toRawJson() => json.encode(toJson());

  ${names.pascal}Entity toEntity() => this;
}
`;

export const templateModel = (ctx: RenderContext): string => {
  switch (ctx.model) {
    case "immutable":
      return immutableModel(ctx);
    case "valueEquality":
      return valueEqualityModel(ctx);
    case "plain":
      return plainModel(ctx);
  }
};

const dataSourceStub = (method: string): string => `    // TODO: Implement API call
    throw UnimplementedError('${method}() not implemented');`;

export const templateDataSource = ({ names }: RenderContext): string => `import '../models/${names.snake}_model.dart';

abstract class ${names.pascal}RemoteDataSource {
  Future<List<${names.pascal}Model>> getAll();
  Future<${names.pascal}Model?> getById(String id);
  Future<${names.pascal}Model> create(${names.pascal}Model model);
  Future<${names.pascal}Model> update(${names.pascal}Model model);
  Future<void> delete(String id);
}

class ${names.pascal}RemoteDataSourceImpl implements ${names.pascal}RemoteDataSource {
  const ${names.pascal}RemoteDataSourceImpl();

  @override
  Future<List<${names.pascal}Model>> getAll() async {
${dataSourceStub("getAll")}
  }

  @override
  Future<${names.pascal}Model?> getById(String id) async {
${dataSourceStub("getById")}
  }

  @override
  Future<${names.pascal}Model> create(${names.pascal}Model model) async {
${dataSourceStub("create")}
  }

  @override
  Future<${names.pascal}Model> update(${names.pascal}Model model) async {
${dataSourceStub("update")}
  }

  @override
  Future<void> delete(String id) async {
${dataSourceStub("delete")}
  }
}
`;

export const templateRepositoryImpl = ({ names }: RenderContext): string => `import '../../domain/entities/${names.snake}_entity.dart';
import '../../domain/repositories/${names.snake}_repository.dart';
import '../datasources/${names.snake}_remote_data_source.dart';
import '../models/${names.snake}_model.dart';

class ${names.pascal}RepositoryImpl implements ${names.pascal}Repository {
  const ${names.pascal}RepositoryImpl(this._remoteDataSource);

  final ${names.pascal}RemoteDataSource _remoteDataSource;

  @override
  Future<List<${names.pascal}Entity>> getAll() async {
    final models = await _remoteDataSource.getAll();
    return models.map((model) => model.toEntity()).toList();
  }

  @override
  Future<${names.pascal}Entity?> getById(String id) async {
    final model = await _remoteDataSource.getById(id);
    return model?.toEntity();
  }

  @override
  Future<${names.pascal}Entity> create(${names.pascal}Entity entity) async {
    final model = ${names.pascal}Model(
      id: entity.id,
      // Map your properties here
    );
    final createdModel = await _remoteDataSource.create(model);
    return createdModel.toEntity();
  }

  @override
  Future<${names.pascal}Entity> update(${names.pascal}Entity entity) async {
    final model = ${names.pascal}Model(
      id: entity.id,
      // Map your properties here
    );
    final updatedModel = await _remoteDataSource.update(model);
    return updatedModel.toEntity();
  }

  @override
  Future<void> delete(String id) async {
    await _remoteDataSource.delete(id);
  }
}
`;
