import { inject, injectable } from 'inversify';
import { HxLocation, SwapType, TriggerPayload, TriggerStage } from '@hxwire/htmx-api';
import { htmxFrom } from '@hxwire/htmx-server';
import { MethodMeta, ResponseWrapper } from '@hxwire/http-filters';
import { TodoService } from '../todos/TodoService';
import { renderError, renderPage, renderTodoItem, renderTodoList } from '../views/TodoViews';

/**
 * TodoController - The todo pages and the htmx actions behind them.
 *
 * Routes:
 * - GET /             full page, or only the list for htmx requests
 * - POST /todos       add a todo, answer with its list item
 * - POST /todos/clear empty the list and ask the browser to refresh
 * - GET /legacy       send htmx to / without a full page load
 */
@injectable()
export class TodoController {
    constructor(@inject(TodoService) private readonly todos: TodoService) {}

    async index(meta: MethodMeta): Promise<ResponseWrapper<string>> {
        const htmx = htmxFrom(meta);
        // boosted navigation and history restores still need the whole page
        if (htmx.isHtmx && !htmx.boosted && !htmx.historyRestoreRequest) {
            return new ResponseWrapper(renderTodoList(this.todos.list()));
        }
        return new ResponseWrapper(renderPage(this.todos.list()));
    }

    async addTodo(meta: MethodMeta): Promise<ResponseWrapper<string>> {
        const htmx = htmxFrom(meta);
        const form = new URLSearchParams(meta.requestBody ?? '');
        const todo = this.todos.add(form.get('title') ?? '');

        if (!todo) {
            htmx.retarget('#errors');
            htmx.reswap(SwapType.InnerHtml);
            return new ResponseWrapper(renderError('A todo needs a title'));
        }

        htmx.triggerEvent('todo-added', TriggerPayload.json(todo));
        htmx.triggerEvent('focus-input', undefined, TriggerStage.AFTER_SETTLE);
        return new ResponseWrapper(renderTodoItem(todo));
    }

    async clearTodos(meta: MethodMeta): Promise<ResponseWrapper<string>> {
        const removed = this.todos.clear();
        console.log(`[TodoController] Cleared ${removed} todos`);
        htmxFrom(meta).refresh();
        return new ResponseWrapper('');
    }

    async legacy(meta: MethodMeta): Promise<ResponseWrapper<string>> {
        htmxFrom(meta).redirectWithLocation(new HxLocation('/').target('#todos').swap(SwapType.OuterHtml));
        return new ResponseWrapper('<a href="/">Moved</a>');
    }
}
