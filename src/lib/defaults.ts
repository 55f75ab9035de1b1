// Default accounts and categories created for a new user

import { ACCOUNT_TYPE_DEFAULTS, type AccountType } from './types';

export interface DefaultCategory {
  name: string;
  icon: string;
  color_hex: string;
  is_expense_category: boolean;
  sort_order: number;
}

export interface DefaultAccount {
  name: string;
  account_type: AccountType;
  icon: string;
  color_hex: string;
}

export const DEFAULT_CURRENCY_CODE = 'INR';

export const DEFAULT_EXPENSE_CATEGORIES: DefaultCategory[] = [
  { name: 'Food & Dining', icon: 'fork.knife', color_hex: '#FF9500', is_expense_category: true, sort_order: 0 },
  { name: 'Transportation', icon: 'car.fill', color_hex: '#007AFF', is_expense_category: true, sort_order: 1 },
  { name: 'Shopping', icon: 'bag.fill', color_hex: '#FF2D55', is_expense_category: true, sort_order: 2 },
  { name: 'Entertainment', icon: 'tv.fill', color_hex: '#AF52DE', is_expense_category: true, sort_order: 3 },
  { name: 'Bills & Utilities', icon: 'bolt.fill', color_hex: '#FFCC00', is_expense_category: true, sort_order: 4 },
  { name: 'Health', icon: 'heart.fill', color_hex: '#FF3B30', is_expense_category: true, sort_order: 5 },
  { name: 'Travel', icon: 'airplane', color_hex: '#5AC8FA', is_expense_category: true, sort_order: 6 },
  { name: 'Other', icon: 'ellipsis.circle.fill', color_hex: '#8E8E93', is_expense_category: true, sort_order: 7 },
];

export const DEFAULT_INCOME_CATEGORIES: DefaultCategory[] = [
  { name: 'Salary', icon: 'briefcase.fill', color_hex: '#34C759', is_expense_category: false, sort_order: 0 },
  { name: 'Freelance', icon: 'laptopcomputer', color_hex: '#007AFF', is_expense_category: false, sort_order: 1 },
  { name: 'Investments', icon: 'chart.line.uptrend.xyaxis', color_hex: '#5856D6', is_expense_category: false, sort_order: 2 },
  { name: 'Gifts', icon: 'gift.fill', color_hex: '#FF2D55', is_expense_category: false, sort_order: 3 },
  { name: 'Other Income', icon: 'ellipsis.circle.fill', color_hex: '#8E8E93', is_expense_category: false, sort_order: 4 },
];

function defaultAccount(name: string, accountType: AccountType): DefaultAccount {
  return {
    name,
    account_type: accountType,
    icon: ACCOUNT_TYPE_DEFAULTS[accountType].icon,
    color_hex: ACCOUNT_TYPE_DEFAULTS[accountType].colorHex,
  };
}

export const DEFAULT_ACCOUNTS: DefaultAccount[] = [
  defaultAccount('Cash', 'cash'),
  defaultAccount('Bank Account', 'bank'),
  defaultAccount('Credit Card', 'credit'),
  defaultAccount('Savings', 'savings'),
];
