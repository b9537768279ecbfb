import type { RenderContext } from "../types.js";

const loadHandler = (pascal: string, camel: string, eventName: string): string => `  Future<void> _on${eventName}(
    ${eventName} event,
    Emitter<${pascal}State> emit,
  ) async {
    emit(const ${pascal}Loading());
    try {
      final result = await _${camel}UseCase();
      emit(${pascal}Loaded(result));
    } catch (e) {
      emit(${pascal}Error(e.toString()));
    }
  }`;

export const templateBloc = ({ names }: RenderContext): string => {
  const { pascal, camel, snake } = names;
  return `import 'package:flutter_bloc/flutter_bloc.dart';
import 'package:equatable/equatable.dart';
import '../../domain/entities/${snake}_entity.dart';
import '../../domain/usecases/${snake}_usecase.dart';

part '${snake}_event.dart';
part '${snake}_state.dart';

class ${pascal}Bloc extends Bloc<${pascal}Event, ${pascal}State> {
  ${pascal}Bloc(this._${camel}UseCase) : super(const ${pascal}Initial()) {
    on<Load${pascal}s>(_onLoad${pascal}s);
    on<Refresh${pascal}s>(_onRefresh${pascal}s);
  }

  final ${pascal}UseCase _${camel}UseCase;

${loadHandler(pascal, camel, `Load${pascal}s`)}

${loadHandler(pascal, camel, `Refresh${pascal}s`)}
}
`;
};

export const templateBlocEvent = ({ names }: RenderContext): string => `part of '${names.snake}_bloc.dart';

abstract class ${names.pascal}Event extends Equatable {
  const ${names.pascal}Event();

  @override
  List<Object> get props => [];
}

class Load${names.pascal}s extends ${names.pascal}Event {
  const Load${names.pascal}s();
}

class Refresh${names.pascal}s extends ${names.pascal}Event {
  const Refresh${names.pascal}s();
}
`;

export const templateBlocState = ({ names }: RenderContext): string => `part of '${names.snake}_bloc.dart';

abstract class ${names.pascal}State extends Equatable {
  const ${names.pascal}State();

  @override
  List<Object> get props => [];
}

class ${names.pascal}Initial extends ${names.pascal}State {
  const ${names.pascal}Initial();
}

class ${names.pascal}Loading extends ${names.pascal}State {
  const ${names.pascal}Loading();
}

class ${names.pascal}Loaded extends ${names.pascal}State {
  const ${names.pascal}Loaded(this.${names.camel}List);

  final List<${names.pascal}Entity> ${names.camel}List;

  @override
  List<Object> get props => [${names.camel}List];
}

class ${names.pascal}Error extends ${names.pascal}State {
  const ${names.pascal}Error(this.message);

  final String message;

  @override
  List<Object> get props => [message];
}
`;

export const templateBlocPage = ({ names }: RenderContext): string => `import 'package:flutter/material.dart';
import 'package:flutter_bloc/flutter_bloc.dart';
import '../bloc/${names.snake}_bloc.dart';

class ${names.pascal}Page extends StatelessWidget {
  const ${names.pascal}Page({Key? key}) : super(key: key);

  @override
  Widget build(BuildContext context) {
    return Scaffold(
      appBar: AppBar(
        title: const Text('${names.pascal}'),
      ),
      body: BlocBuilder<${names.pascal}Bloc, ${names.pascal}State>(
        builder: (context, state) {
          if (state is ${names.pascal}Loading) {
            return const Center(child: CircularProgressIndicator());
          }

          if (state is ${names.pascal}Error) {
            return Center(
              child: Column(
                mainAxisAlignment: MainAxisAlignment.center,
                children: [
                  Text('Error: \${state.message}'),
                  ElevatedButton(
                    onPressed: () => context.read<${names.pascal}Bloc>().add(const Refresh${names.pascal}s()),
                    child: const Text('Retry'),
                  ),
                ],
              ),
            );
          }

          if (state is ${names.pascal}Loaded) {
            return RefreshIndicator(
              onRefresh: () async {
                context.read<${names.pascal}Bloc>().add(const Refresh${names.pascal}s());
              },
              child: ListView.builder(
                itemCount: state.${names.camel}List.length,
                itemBuilder: (context, index) {
                  final item = state.${names.camel}List[index];
                  return ListTile(
                    title: Text(item.id),
                    // Add more UI components here
                  );
                },
              ),
            );
          }

          return const Center(child: Text('No data available'));
        },
      ),
    );
  }
}
`;

export const templateBlocProvider = ({ names }: RenderContext): string => `import 'package:flutter/widgets.dart';
import 'package:flutter_bloc/flutter_bloc.dart';
import 'package:get_it/get_it.dart';
import '../../data/datasources/${names.snake}_remote_data_source.dart';
import '../../data/repositories/${names.snake}_repository_impl.dart';
import '../../domain/repositories/${names.snake}_repository.dart';
import '../../domain/usecases/${names.snake}_usecase.dart';
import '../bloc/${names.snake}_bloc.dart';

class ${names.pascal}Provider {
  static void init() {
    final getIt = GetIt.instance;

    // Data sources
    getIt.registerLazySingleton<${names.pascal}RemoteDataSource>(
      () => ${names.pascal}RemoteDataSourceImpl(),
    );

    // Repositories
    getIt.registerLazySingleton<${names.pascal}Repository>(
      () => ${names.pascal}RepositoryImpl(getIt()),
    );

    // Use cases
    getIt.registerLazySingleton<${names.pascal}UseCase>(
      () => ${names.pascal}UseCase(getIt()),
    );

    getIt.registerFactory<${names.pascal}Bloc>(
      () => ${names.pascal}Bloc(getIt()),
    );
  }

  static BlocProvider<${names.pascal}Bloc> provide({
    required Widget child,
  }) {
    return BlocProvider<${names.pascal}Bloc>(
      create: (context) => GetIt.instance<${names.pascal}Bloc>()..add(const Load${names.pascal}s()),
      child: child,
    );
  }
}
`;
