export type OwnerId = string;

export type TransactionKind = 'income' | 'expense' | 'savings';

export type DebtType = 'borrowed' | 'lent' | 'settlement';

export type DebtStatus = 'pending' | 'settled';

/** `returned` closes money the owner borrowed, `received` closes money the owner lent. */
export type SettleDirection = 'returned' | 'received';

export interface TransactionRecord {
  id: number;
  owner: OwnerId;
  kind: TransactionKind;
  amount_paise: number;
  category: string | null;
  note: string | null;
  created_at: string;
}

export interface DebtRecord {
  id: number;
  owner: OwnerId;
  debt_type: DebtType;
  amount_paise: number;
  contact_name: string;
  purpose: string | null;
  status: DebtStatus;
  borrow_date: string;
  return_date: string | null;
  created_at: string;
  updated_at: string;
}

export interface UserSettings {
  owner: OwnerId;
  daily_report: boolean;
  report_time: string;
}

export interface NewTransaction {
  owner: OwnerId;
  kind: TransactionKind;
  amount_paise: number;
  category: string | null;
  note: string | null;
}

export interface NewDebt {
  owner: OwnerId;
  debt_type: DebtType;
  amount_paise: number;
  contact_name: string;
  purpose: string | null;
}

export type Period =
  | { type: 'today' }
  | { type: 'month' }
  | { type: 'last30' }
  | { type: 'day'; date: string }
  | { type: 'range'; from: string; to: string };

/** Half-open range of stored timestamps, `from <= created_at < to`. */
export interface DateRange {
  from: string;
  to: string;
  label: string;
}

export interface KindTotal {
  kind: TransactionKind;
  total_paise: number;
  count: number;
}

export interface DayTotal {
  day: string;
  total_paise: number;
  count: number;
}

export interface CategoryTotal {
  category: string;
  total_paise: number;
  count: number;
}

export interface PersonTotal {
  contact_name: string;
  debt_type: DebtType;
  status: DebtStatus;
  total_paise: number;
  count: number;
}

export type LedgerQuery =
  | { groupBy: 'kind'; period: Period }
  | { groupBy: 'day'; period: Period; kind: TransactionKind }
  | { groupBy: 'category'; period: Period; kind: TransactionKind }
  | { groupBy: 'person' };

export type AggregateRows =
  | { groupBy: 'kind'; range: DateRange; rows: KindTotal[] }
  | { groupBy: 'day'; range: DateRange; kind: TransactionKind; rows: DayTotal[] }
  | { groupBy: 'category'; range: DateRange; kind: TransactionKind; rows: CategoryTotal[] }
  | { groupBy: 'person'; rows: PersonTotal[] };

export type ConversationState =
  | 'idle'
  | 'awaiting_income_amount'
  | 'awaiting_expense_detail'
  | 'awaiting_savings_amount'
  | 'awaiting_borrow_detail'
  | 'awaiting_lend_detail'
  | 'awaiting_settlement_detail';

export interface ConversationContext {
  state: ConversationState;
  createdAt: number;
  lastActivity: number;
}

export interface Button {
  text: string;
  action: string;
}

export type ButtonRows = Button[][];

/** Transport-independent reply: Markdown text and the buttons to show under it. */
export interface BotReply {
  text: string;
  buttons: ButtonRows;
}
