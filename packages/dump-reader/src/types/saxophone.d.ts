// saxophone ships no type declarations and has no @types package.
declare module "saxophone" {
  import { Writable } from "node:stream";

  namespace Saxophone {
    interface TagOpenNode {
      name: string;
      attrs: string;
      isSelfClosing: boolean;
    }

    interface TagCloseNode {
      name: string;
    }

    interface ContentsNode {
      contents: string;
    }
  }

  class Saxophone extends Writable {
    constructor();
    on(event: "tagopen", listener: (tag: Saxophone.TagOpenNode) => void): this;
    on(event: "tagclose", listener: (tag: Saxophone.TagCloseNode) => void): this;
    on(
      event: "text" | "cdata" | "comment" | "processinginstruction",
      listener: (node: Saxophone.ContentsNode) => void,
    ): this;
    on(event: string | symbol, listener: (...args: unknown[]) => void): this;
  }

  export = Saxophone;
}
