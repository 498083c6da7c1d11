export interface Cue {
  startSec: number;
  endSec: number;
  /** Raw cue payload, inline timing tags included */
  text: string;
}

export interface TimedWord {
  startSec: number;
  text: string;
}

export interface SentenceUnit {
  kind: 'sentence';
  startSec: number;
  text: string;
}

export interface ParagraphBreak {
  kind: 'paragraphBreak';
}

export type TranscriptUnit = SentenceUnit | ParagraphBreak;

export interface Chapter {
  startTime: number;
  title: string;
}

export interface VideoInfo {
  id?: string;
  title: string;
  description: string;
  chapters: Chapter[];
}

export interface SectionHint {
  /** 1-based line number in the sentence-per-line Markdown */
  line: number;
  title: string;
}

export interface LinkEntry {
  phrase: string;
  url: string;
}

export interface StructureHints {
  title?: string;
  sections: SectionHint[];
  paragraphs: number[];
  links: LinkEntry[];
}

export interface DescriptionLink {
  url: string;
  title: string;
}
