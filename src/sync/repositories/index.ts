export { BaseRepository } from './BaseRepository';
export type { DeleteResult, EntityChanges, EntityInput, PushScheduler, RepositoryOptions } from './BaseRepository';
export { AccountsRepository } from './AccountsRepository';
export { BudgetsRepository } from './BudgetsRepository';
export { CategoriesRepository } from './CategoriesRepository';
export { TransactionsRepository } from './TransactionsRepository';
export { UserProfileRepository } from './UserProfileRepository';
export { seedDefaultData, type SeedResult } from './seedDefaultData';
