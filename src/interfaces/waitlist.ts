export interface WaitlistSubmission {
  email: string;
  token: string;
  city?: string;
  source?: string;
}

export interface WaitlistEntry {
  email: string;
  city: string;
  source: string;
  subscribed_at: Date;
  updated_at?: Date;
}

export type UpsertOutcome = 'created' | 'updated';
