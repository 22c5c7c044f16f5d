import { escapeHtml } from '@hxwire/htmx-server';
import { Todo } from '../todos/TodoService';

export function renderTodoItem(todo: Todo): string {
    return `<li id="todo-${todo.id}">${escapeHtml(todo.title)}</li>`;
}

export function renderTodoList(todos: Todo[]): string {
    return `<ul id="todos">${todos.map(renderTodoItem).join('')}</ul>`;
}

export function renderError(message: string): string {
    return `<p class="error">${escapeHtml(message)}</p>`;
}

export function renderPage(todos: Todo[]): string {
    return `<!DOCTYPE html>
<html>
<head>
  <title>Todos</title>
  <script src="https://unpkg.com/htmx.org@2.0.4"></script>
</head>
<body>
  <h1>Todos</h1>
  <form hx-post="/todos" hx-target="#todos" hx-swap="beforeend">
    <input id="title" name="title" autofocus>
    <button type="submit">Add</button>
  </form>
  <div id="errors"></div>
  ${renderTodoList(todos)}
  <button hx-post="/todos/clear">Clear</button>
  <a hx-get="/legacy" href="/legacy">Old link</a>
  <script>
    document.body.addEventListener('focus-input', () => document.getElementById('title').focus());
  </script>
</body>
</html>
`;
}
