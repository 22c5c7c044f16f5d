import { ContainerModule } from 'inversify';
import { TodoController } from '../controllers/TodoController';
import { TodoService } from '../todos/TodoService';

/**
 * AppModule - DI configuration for the todo application.
 *
 * All bindings use .inSingletonScope() so the todo list is shared by every
 * request.
 */
export const AppModule = new ContainerModule((options) => {
    const { bind } = options;

    bind<TodoService>(TodoService).toSelf().inSingletonScope();
    bind<TodoController>(TodoController).toSelf().inSingletonScope();
});
