export interface NoteQuery {
  key?: string;
  accidental?: string;
  octave?: string;
  duration?: string;
}

export type RenderResult =
  | {
      success: true;
      wav: Uint8Array;
      sampleCount: number;
      duration: number;
    }
  | {
      success: false;
      error: string;
    };
