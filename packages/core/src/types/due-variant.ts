/**
 * The single due-date representation sent on write, chosen by specificity:
 * exact time > whole day > free text. `none` clears the due date by omission.
 */
export type DueVariant =
  | { readonly kind: 'none' }
  | { readonly kind: 'string'; readonly string: string }
  | { readonly kind: 'date'; readonly date: string }
  | { readonly kind: 'datetime'; readonly datetime: string };
