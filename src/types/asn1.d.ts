// asn1.js ships no type declarations; this covers the parts used here.
declare module 'asn1.js' {
  namespace asn1 {
    export interface Node {
      seq(): Node;
      obj(...children: Node[]): Node;
      key(name: string): Node;
      int(): Node;
      octstr(): Node;
      bitstr(): Node;
      objid(values?: Record<string, string>): Node;
      explicit(tag: number): Node;
      optional(): Node;
    }

    export interface BitString {
      unused: number;
      data: Buffer;
    }

    export interface Entity<T> {
      encode(data: T, enc: 'der'): Buffer;
      encode(data: T, enc: 'pem', options: { label: string }): string;
    }

    export function define<T>(name: string, body: (this: Node) => void): Entity<T>;
  }

  export = asn1;
}
