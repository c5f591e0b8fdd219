// Rows come straight from unstable markup, so every field stays a display string.
export interface CardTransaction {
  date: string;
  description: string;
  amount: string;
}
