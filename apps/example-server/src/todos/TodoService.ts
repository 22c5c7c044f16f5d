import { injectable } from 'inversify';

export interface Todo {
    id: number;
    title: string;
}

/**
 * In-memory todo list. State lives as long as the process.
 */
@injectable()
export class TodoService {
    private todos: Todo[] = [];
    private nextId = 1;

    list(): Todo[] {
        return [...this.todos];
    }

    /**
     * @returns the new todo, or undefined when the title is blank
     */
    add(title: string): Todo | undefined {
        const trimmed = title.trim();
        if (trimmed.length === 0) {
            return undefined;
        }
        const todo: Todo = { id: this.nextId++, title: trimmed };
        this.todos.push(todo);
        return todo;
    }

    clear(): number {
        const removed = this.todos.length;
        this.todos = [];
        return removed;
    }
}
