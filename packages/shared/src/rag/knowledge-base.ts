/**
 * Domain Knowledge Base
 *
 * Splits the Markdown knowledge document into titled chunks at "## " section and
 * "### " subsection boundaries.
 */

export interface KnowledgeChunk {
  section: string;
  subsection: string;
  /** "Section - Subsection", or just the section when there is no subsection */
  title: string;
  text: string;
}

function makeChunk(section: string, subsection: string, lines: string[]): KnowledgeChunk {
  return {
    section,
    subsection,
    title: subsection ? `${section} - ${subsection}` : section,
    text: lines.join('\n').trim(),
  };
}

/**
 * Parse Markdown into knowledge chunks. Text before the first heading forms an
 * untitled chunk; chunks with no text are dropped.
 */
export function parseKnowledgeBase(content: string): KnowledgeChunk[] {
  const chunks: KnowledgeChunk[] = [];
  let section = '';
  let subsection = '';
  let lines: string[] = [];

  const flush = (): void => {
    if (lines.length > 0) {
      chunks.push(makeChunk(section, subsection, lines));
      lines = [];
    }
  };

  for (const line of content.split('\n')) {
    if (line.startsWith('## ')) {
      flush();
      section = line.slice(3).trim();
      subsection = '';
    } else if (line.startsWith('### ')) {
      flush();
      subsection = line.slice(4).trim();
    } else {
      lines.push(line);
    }
  }
  flush();

  return chunks.filter((chunk) => chunk.text.length > 0);
}
