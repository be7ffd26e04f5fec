import { randomInt } from 'node:crypto';
import { ACCOUNT_NUMBER_LENGTH, AccountType } from '@/constants/banking';
import { Account } from '@/models';
import { BusinessRuleError } from '@/errors';
import { IAccountRepository } from '@/repositories/interfaces';
import { createLogger } from '@/adapters/logging/LoggerFactory';

const log = createLogger('AccountService');

const MAX_NUMBER_ATTEMPTS = 10;

/**
 * Random account number from a CSPRNG
 * Never sequential: knowing one number says nothing about the others.
 */
export function generateAccountNumber(): string {
  let digits = '';
  for (let i = 0; i < ACCOUNT_NUMBER_LENGTH; i++) {
    digits += randomInt(0, 10).toString();
  }
  return digits;
}

/**
 * Account Service
 * Opening and listing accounts. Balances are only changed by the transaction engine.
 */
export class AccountService {
  constructor(
    private accountRepo: IAccountRepository,
    private generateNumber: () => string = generateAccountNumber
  ) {}

  async listAccounts(userId: number): Promise<Account[]> {
    return this.accountRepo.findByUserId(userId);
  }

  /**
   * Open an account with a zero balance
   * A user may hold one active account of each type.
   */
  async openAccount(userId: number, accountType: AccountType): Promise<Account> {
    const existing = await this.accountRepo.findActiveByUserAndType(userId, accountType);
    if (existing) {
      throw new BusinessRuleError(`You already have an active ${accountType} account`, 'DUPLICATE_ACCOUNT_TYPE');
    }

    const accountNumber = await this.allocateAccountNumber();
    const account = await this.accountRepo.create({ userId, accountNumber, accountType });

    log.info({ userId, accountId: account.id, accountType }, 'Account opened');
    return account;
  }

  private async allocateAccountNumber(): Promise<string> {
    for (let attempt = 0; attempt < MAX_NUMBER_ATTEMPTS; attempt++) {
      const candidate = this.generateNumber();
      if (!(await this.accountRepo.accountNumberExists(candidate))) {
        return candidate;
      }
    }
    throw new Error('Could not allocate a unique account number');
  }
}
