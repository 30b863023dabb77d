/**
 * Deep readonly utility type that makes all nested properties readonly.
 * Arrays become readonly arrays of deeply readonly elements.
 */
export type DeepReadonly<T> = T extends ReadonlyArray<infer E>
	? ReadonlyArray<DeepReadonly<E>>
	: T extends object
	? { readonly [P in keyof T]: DeepReadonly<T[P]> }
	: T;

/**
 * Attribute name to raw string value, as declared on a markup element.
 */
export type AttributeRecord = Readonly<Record<string, string>>;
