import { formatCurrency } from '../lib/utils/currency';
import { REPORT_TIMES } from './ledger-service';
import type { ButtonRows, DebtRecord, UserSettings } from '../types';

export const ACTIONS = {
  menuIncome: 'menu_income',
  menuExpense: 'menu_expense',
  menuSavings: 'menu_savings',
  menuReports: 'menu_reports',
  menuLoans: 'menu_loans',
  menuSettings: 'menu_settings',

  reportToday: 'report_today',
  reportMonth: 'report_month',
  reportDailyExpenses: 'report_daily_expenses',
  reportSpending: 'report_spending',
  reportMiniStatement: 'report_mini_statement',
  reportFullStatement: 'report_full_statement',

  loanBorrow: 'loan_borrow',
  loanLend: 'loan_lend',
  loanSettlement: 'loan_settlement',
  loanPending: 'loan_pending',
  loanLedger: 'loan_ledger',

  resetConfirm: 'reset_confirm',
  resetConfirmed: 'reset_confirmed',
  settingsToggleDaily: 'settings_toggle_daily',
  cancel: 'cancel',
  backMenu: 'back_menu',
  help: 'help',
} as const;

export const SETTLE_RETURNED_PREFIX = 'settle_returned:';
export const SETTLE_RECEIVED_PREFIX = 'settle_received:';
export const SETTINGS_TIME_PREFIX = 'settings_time:';

export function mainMenu(): ButtonRows {
  return [
    [
      { text: '💰 Add Income', action: ACTIONS.menuIncome },
      { text: '💸 Add Expense', action: ACTIONS.menuExpense },
    ],
    [
      { text: '🏦 Add Savings', action: ACTIONS.menuSavings },
      { text: '📊 Reports', action: ACTIONS.menuReports },
    ],
    [
      { text: '🤝 Loans', action: ACTIONS.menuLoans },
      { text: '📝 Mini Statement', action: ACTIONS.reportMiniStatement },
    ],
    [
      { text: '⚙️ Settings', action: ACTIONS.menuSettings },
      { text: '🔄 Reset All', action: ACTIONS.resetConfirm },
    ],
    [{ text: '❓ Help', action: ACTIONS.help }],
  ];
}

export function reportsMenu(): ButtonRows {
  return [
    [
      { text: '📅 Today Report', action: ACTIONS.reportToday },
      { text: '📆 Month Report', action: ACTIONS.reportMonth },
    ],
    [
      { text: '💸 Daily Expenses', action: ACTIONS.reportDailyExpenses },
      { text: '📈 Spending Analysis', action: ACTIONS.reportSpending },
    ],
    [
      { text: '📝 Mini Statement', action: ACTIONS.reportMiniStatement },
      { text: '📜 Full Statement', action: ACTIONS.reportFullStatement },
    ],
    backRow(),
  ];
}

export function loansMenu(): ButtonRows {
  return [
    [
      { text: '📥 Borrowed', action: ACTIONS.loanBorrow },
      { text: '📤 Lent', action: ACTIONS.loanLend },
    ],
    [
      { text: '⏳ Pending Loans', action: ACTIONS.loanPending },
      { text: '👥 By Person', action: ACTIONS.loanLedger },
    ],
    [{ text: '🤝 Record Settlement', action: ACTIONS.loanSettlement }],
    backRow(),
  ];
}

export function settingsMenu(settings: UserSettings): ButtonRows {
  const times = REPORT_TIMES.map((time) => ({
    text: time === settings.report_time ? `✅ ${time}` : time,
    action: `${SETTINGS_TIME_PREFIX}${time}`,
  }));

  return [
    [
      {
        text: settings.daily_report ? '🔕 Turn off daily report' : '🔔 Turn on daily report',
        action: ACTIONS.settingsToggleDaily,
      },
    ],
    times.slice(0, 3),
    times.slice(3),
    backRow(),
  ];
}

export function resetConfirmMenu(): ButtonRows {
  return [
    [
      { text: '✅ Yes, Reset All', action: ACTIONS.resetConfirmed },
      { text: '❌ Cancel', action: ACTIONS.backMenu },
    ],
  ];
}

/** One settle button per pending debt, then the way back. */
export function pendingDebtsMenu(debts: DebtRecord[]): ButtonRows {
  const rows: ButtonRows = debts.map((debt) => {
    const returned = debt.debt_type === 'borrowed';
    return [
      {
        text: `${returned ? '✅ Returned' : '✅ Received'} #${debt.id} ${debt.contact_name} ${formatCurrency(debt.amount_paise)}`,
        action: `${returned ? SETTLE_RETURNED_PREFIX : SETTLE_RECEIVED_PREFIX}${debt.id}`,
      },
    ];
  });
  rows.push(backRow());
  return rows;
}

export function cancelMenu(): ButtonRows {
  return [[{ text: '❌ Cancel', action: ACTIONS.cancel }]];
}

export function backMenu(): ButtonRows {
  return [backRow()];
}

function backRow() {
  return [{ text: '🔙 Back to Menu', action: ACTIONS.backMenu }];
}
