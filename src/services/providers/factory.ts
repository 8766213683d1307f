import type { Account } from '../../shared/types.js';
import { ImapProvider } from './imapProvider.js';
import type { ImapProviderOptions } from './imapProvider.js';
import { LabelApiProvider } from './labelApiProvider.js';
import type { LabelApiProviderOptions } from './labelApiProvider.js';
import type { ProviderAdapter } from './types.js';

export type ProviderFactoryOptions = LabelApiProviderOptions & ImapProviderOptions;

export type ProviderFactory = (account: Account) => ProviderAdapter;

export const createProviderAdapter = (account: Account, options: ProviderFactoryOptions): ProviderAdapter => {
  switch (account.provider) {
    case 'label_api':
      return new LabelApiProvider(account, options);
    case 'imap':
      return new ImapProvider(account, options);
  }
};

export const providerFactory = (options: ProviderFactoryOptions): ProviderFactory =>
  (account) => createProviderAdapter(account, options);
