/**
 * HTML display sinks
 *
 * An HtmlSink receives finished markup fragments from the HTML renderer
 * (and the one-time style block from Display).
 */

export interface HtmlSink {
  display(markup: string): void;
}

/**
 * Writes each fragment, newline-terminated, to a stream (stdout by default)
 */
export class StreamHtmlSink implements HtmlSink {
  constructor(private readonly stream: NodeJS.WritableStream = process.stdout) {}

  display(markup: string): void {
    this.stream.write(markup + '\n');
  }
}

/**
 * Collects fragments in memory, for embedding or report export
 */
export class BufferHtmlSink implements HtmlSink {
  private readonly fragments: string[] = [];

  display(markup: string): void {
    this.fragments.push(markup);
  }

  getFragments(): readonly string[] {
    return this.fragments;
  }

  toString(): string {
    return this.fragments.join('\n');
  }

  clear(): void {
    this.fragments.length = 0;
  }
}
