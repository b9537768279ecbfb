import type { RenderContext } from "../types.js";

// Standalone screens: no use case or repository wiring.

export const templateScreenController = ({ names }: RenderContext): string => `import 'package:get/get.dart';

class ${names.pascal}Controller extends GetxController {
  final _isLoading = false.obs;

  bool get isLoading => _isLoading.value;

  @override
  void onInit() {
    super.onInit();
    // Initialize your controller here
  }

  @override
  void onReady() {
    super.onReady();
    // Called after the widget is rendered on screen
  }

  @override
  void onClose() {
    super.onClose();
    // Dispose of any resources
  }
}
`;

const reactiveScreenPage = ({ names }: RenderContext): string => `import 'package:flutter/material.dart';
import 'package:get/get.dart';
import '../controllers/${names.snake}_controller.dart';

class ${names.pascal}Page extends GetView<${names.pascal}Controller> {
  const ${names.pascal}Page({Key? key}) : super(key: key);

  @override
  Widget build(BuildContext context) {
    return Scaffold(
      appBar: AppBar(
        title: const Text('${names.pascal}'),
      ),
      body: const Center(
        child: Text(
          '${names.pascal} Page',
          style: TextStyle(fontSize: 24),
        ),
      ),
    );
  }
}
`;

const eventDrivenScreenPage = ({ names }: RenderContext): string => `import 'package:flutter/material.dart';
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
          return const Center(
            child: Text(
              '${names.pascal} Page',
              style: TextStyle(fontSize: 24),
            ),
          );
        },
      ),
    );
  }
}
`;

export const templateScreenPage = (ctx: RenderContext): string =>
  ctx.state === "eventDriven" ? eventDrivenScreenPage(ctx) : reactiveScreenPage(ctx);

const reactiveScreenBinding = ({ names }: RenderContext): string => `import 'package:get/get.dart';
import '../controllers/${names.snake}_controller.dart';

class ${names.pascal}Binding extends Bindings {
  @override
  void dependencies() {
    Get.lazyPut<${names.pascal}Controller>(
      () => ${names.pascal}Controller(),
    );
  }
}
`;

const eventDrivenScreenBinding = ({ names }: RenderContext): string => `import 'package:flutter/widgets.dart';
import 'package:flutter_bloc/flutter_bloc.dart';
import 'package:get_it/get_it.dart';
import '../bloc/${names.snake}_bloc.dart';

class ${names.pascal}Provider {
  static void init() {
    GetIt.instance.registerFactory<${names.pascal}Bloc>(
      () => ${names.pascal}Bloc(),
    );
  }

  static BlocProvider<${names.pascal}Bloc> provide({
    required Widget child,
  }) {
    return BlocProvider<${names.pascal}Bloc>(
      create: (context) => GetIt.instance<${names.pascal}Bloc>(),
      child: child,
    );
  }
}
`;

export const templateScreenBinding = (ctx: RenderContext): string =>
  ctx.state === "eventDriven" ? eventDrivenScreenBinding(ctx) : reactiveScreenBinding(ctx);

export const templateScreenBloc = ({ names }: RenderContext): string => `import 'package:flutter_bloc/flutter_bloc.dart';
import 'package:equatable/equatable.dart';

part '${names.snake}_event.dart';
part '${names.snake}_state.dart';

class ${names.pascal}Bloc extends Bloc<${names.pascal}Event, ${names.pascal}State> {
  ${names.pascal}Bloc() : super(const ${names.pascal}Initial()) {
    on<${names.pascal}Started>(_onStarted);
  }

  void _onStarted(${names.pascal}Started event, Emitter<${names.pascal}State> emit) {
    emit(const ${names.pascal}Loaded());
  }
}
`;

export const templateScreenBlocEvent = ({ names }: RenderContext): string => `part of '${names.snake}_bloc.dart';

abstract class ${names.pascal}Event extends Equatable {
  const ${names.pascal}Event();

  @override
  List<Object> get props => [];
}

class ${names.pascal}Started extends ${names.pascal}Event {
  const ${names.pascal}Started();
}
`;

export const templateScreenBlocState = ({ names }: RenderContext): string => `part of '${names.snake}_bloc.dart';

abstract class ${names.pascal}State extends Equatable {
  const ${names.pascal}State();

  @override
  List<Object> get props => [];
}

class ${names.pascal}Initial extends ${names.pascal}State {
  const ${names.pascal}Initial();
}

class ${names.pascal}Loaded extends ${names.pascal}State {
  const ${names.pascal}Loaded();
}
`;
