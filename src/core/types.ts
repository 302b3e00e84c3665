export interface SourceLocation {
  line: number;
  column: number;
}

export interface SourceSpan {
  start: SourceLocation;
  end: SourceLocation;
}

export interface SsmlTextNode {
  readonly kind: "text";
  readonly value: string;
}

export interface SsmlTagNode {
  readonly kind: "tag";
  readonly name: string;
  readonly attributes: ReadonlyMap<string, string>;
  readonly children: readonly SsmlNode[];
}

export type SsmlNode = SsmlTagNode | SsmlTextNode;

export type SsmlAttributesInit =
  | ReadonlyMap<string, string>
  | Iterable<readonly [string, string]>
  | Readonly<Record<string, string>>;

export interface NodeCounts {
  tags: number;
  texts: number;
}
