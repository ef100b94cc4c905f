export type PriorityTier = 'A' | 'B' | 'C';

export interface SeedSegment {
  title: string;
  description: string;
}

// One parsed row, before filtering. Priority is still whatever the model wrote.
export interface RawProspectRow {
  name: string;
  segment: string;
  region: string;
  justification: string;
  website: string;
  priority: string;
}

export type ProspectRecord = Readonly<{
  name: string;
  segment: string;
  region: string;
  justification: string;
  website: string; // '' when unknown
  priority: PriorityTier;
}>;

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string };

export interface CollectionResult {
  prospects: ProspectRecord[];
  calls: number;
  emptyBatches: number;
  duplicateBatches: number;
  segmentsUsed: string[];
}
