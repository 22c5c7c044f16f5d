import { RequestContext } from '@hxwire/core-context';
import { ContextNotActiveError } from '@hxwire/htmx-api';
import { HtmxContext } from '@hxwire/htmx-core';
import { MethodMeta } from '@hxwire/http-filters';

/**
 * Key under which HtmxFilter stores the request's HtmxContext, both in
 * MethodMeta.metadata and in the RequestContext.
 */
export const HTMX_METADATA_KEY = 'HTMX_CONTEXT';

/**
 * The htmx context of the request described by meta.
 * @throws ContextNotActiveError when HtmxFilter did not run for this request
 */
export function htmxFrom(meta: MethodMeta): HtmxContext {
    const htmx = meta.metadata.get(HTMX_METADATA_KEY);
    if (!(htmx instanceof HtmxContext)) {
        throw new ContextNotActiveError(`No htmx context for ${meta.httpMethod} ${meta.path}. Is HtmxFilter in the chain?`);
    }
    return htmx;
}

/**
 * The htmx context of the request currently being handled, for code that has
 * no MethodMeta at hand.
 *
 * ```typescript
 * async addTodo(title: string): Promise<string> {
 *     const todo = this.todos.add(title);
 *     currentHtmx().triggerEvent('todo-added', TriggerPayload.json(todo));
 *     return renderTodo(todo);
 * }
 * ```
 *
 * @throws ContextNotActiveError outside a request handled by HtmxFilter
 */
export function currentHtmx(): HtmxContext {
    const htmx = RequestContext.get(HTMX_METADATA_KEY);
    if (!(htmx instanceof HtmxContext)) {
        throw new ContextNotActiveError('No htmx context is active. Call currentHtmx() only while a request runs through HtmxFilter');
    }
    return htmx;
}
