/**
 * How htmx inserts response content relative to the target element.
 * Each member's value is its wire token.
 */
export enum SwapType {
    InnerHtml = 'innerHTML',
    OuterHtml = 'outerHTML',
    BeforeBegin = 'beforebegin',
    AfterBegin = 'afterbegin',
    BeforeEnd = 'beforeend',
    AfterEnd = 'afterend',
    Delete = 'delete',
    None = 'none',
}

const SWAP_TYPES_BY_TOKEN: ReadonlyMap<string, SwapType> = new Map(
    Object.values(SwapType).map((swapType): [string, SwapType] => [swapType, swapType]),
);

/**
 * Decode a wire token. Matching is exact, so 'innerhtml' is not a swap type.
 */
export function parseSwapType(token: string): SwapType | undefined {
    return SWAP_TYPES_BY_TOKEN.get(token);
}
