import type { RenderContext } from "../types.js";

export const templateGetxController = ({ names }: RenderContext): string => `import 'package:get/get.dart';
import '../../domain/entities/${names.snake}_entity.dart';
import '../../domain/usecases/${names.snake}_usecase.dart';

class ${names.pascal}Controller extends GetxController {
  ${names.pascal}Controller(this._${names.camel}UseCase);

  final ${names.pascal}UseCase _${names.camel}UseCase;

  final _isLoading = false.obs;
  final _${names.camel}List = <${names.pascal}Entity>[].obs;

  bool get isLoading => _isLoading.value;
  List<${names.pascal}Entity> get ${names.camel}List => _${names.camel}List;

  @override
  void onInit() {
    super.onInit();
    load${names.pascal}s();
  }

  Future<void> load${names.pascal}s() async {
    try {
      _isLoading.value = true;
      final result = await _${names.camel}UseCase();
      _${names.camel}List.value = result;
    } catch (e) {
      Get.snackbar('Error', 'Failed to load ${names.camel}s: $e');
    } finally {
      _isLoading.value = false;
    }
  }

  @override
  Future<void> refresh() async {
    await load${names.pascal}s();
  }
}
`;

export const templateGetxPage = ({ names }: RenderContext): string => `import 'package:flutter/material.dart';
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
      body: Obx(() {
        if (controller.isLoading) {
          return const Center(child: CircularProgressIndicator());
        }

        return RefreshIndicator(
          onRefresh: controller.refresh,
          child: ListView.builder(
            itemCount: controller.${names.camel}List.length,
            itemBuilder: (context, index) {
              final item = controller.${names.camel}List[index];
              return ListTile(
                title: Text(item.id),
                // Add more UI components here
              );
            },
          ),
        );
      }),
    );
  }
}
`;

export const templateGetxBinding = ({ names }: RenderContext): string => `import 'package:get/get.dart';
import '../../data/datasources/${names.snake}_remote_data_source.dart';
import '../../data/repositories/${names.snake}_repository_impl.dart';
import '../../domain/repositories/${names.snake}_repository.dart';
import '../../domain/usecases/${names.snake}_usecase.dart';
import '../controllers/${names.snake}_controller.dart';

class ${names.pascal}Binding extends Bindings {
  @override
  void dependencies() {
    Get.lazyPut<${names.pascal}RemoteDataSource>(
      () => ${names.pascal}RemoteDataSourceImpl(),
    );

    Get.lazyPut<${names.pascal}Repository>(
      () => ${names.pascal}RepositoryImpl(Get.find()),
    );

    Get.lazyPut<${names.pascal}UseCase>(
      () => ${names.pascal}UseCase(Get.find()),
    );

    Get.lazyPut<${names.pascal}Controller>(
      () => ${names.pascal}Controller(Get.find()),
    );
  }
}
`;
