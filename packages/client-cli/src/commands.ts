/**
 * CLI commands over a ColdClient. Output goes through `print`, one line per
 * call, so the entry point decides how lines are shown.
 */

import type { StatusMessage, TransferEntry } from '@coldmesh/protocol';
import type { CommandArgs } from './cli.js';
import type { ColdClient } from './coldClient.js';

export type Print = (line: string) => void;

export function formatTransfer(t: TransferEntry): string {
  const sign = t.direction === 'in' ? '+' : '-';
  const height = t.height === 0 ? 'pool' : `height ${t.height}`;
  return `${sign}${t.amount} XMR  ${height}  ${t.confirmations} conf  ${t.hash}`;
}

export function formatStatus(status: StatusMessage): string {
  const tx = status.txHash ? ` (${status.txHash})` : '';
  return `${status.event}: ${status.message}${tx}`;
}

/**
 * Run one command. `watch` subscribes and returns at once; the caller keeps
 * the process alive and calls the returned function to unsubscribe.
 */
export async function runCommand(client: ColdClient, args: CommandArgs, print: Print): Promise<() => void> {
  const done = () => {};

  switch (args.command) {
    case 'provision': {
      const ack = await client.provision(args);
      if (!ack.success) {
        throw new Error(`Provisioning refused: ${ack.status}`);
      }
      print(ack.status);
      return done;
    }

    case 'balance': {
      const balance = await client.getBalance();
      print(`Balance:  ${balance.balance} XMR`);
      print(`Unlocked: ${balance.unlockedBalance} XMR`);
      print(`Synced to height ${balance.syncHeight}`);
      if (balance.blocksToUnlock > 0) {
        print(`Fully unlocked in ${balance.blocksToUnlock} blocks`);
      }
      if (balance.cachedAt !== undefined) {
        print(`Wallet engine unreachable; last read at ${new Date(balance.cachedAt).toISOString()}`);
      }
      return done;
    }

    case 'send': {
      const { unsigned, result, keyImages } = await client.send(args.destination, args.amount, args.priority);
      print(`Sent ${args.amount} XMR to ${args.destination}`);
      print(`Fee:    ${unsigned.fee} XMR`);
      print(`Change: ${unsigned.change} XMR`);
      print(`Transaction ${result.txHash} ${result.status}`);
      if (!keyImages) {
        print('Key images not delivered; run sync before the next send');
      }
      return done;
    }

    case 'history': {
      const transfers = await client.history(args.limit, args.minHeight);
      if (transfers.length === 0) {
        print('No transfers');
      }
      for (const transfer of transfers) {
        print(formatTransfer(transfer));
      }
      return done;
    }

    case 'sync': {
      const applied = await client.syncKeyImages(undefined, args.all);
      print(`Key images applied at height ${applied.height}`);
      print(`Spent:   ${applied.spent} XMR`);
      print(`Unspent: ${applied.unspent} XMR`);
      return done;
    }

    case 'watch':
      print(`Watching status for ${client.operatorId}`);
      return client.onStatus((status) => print(formatStatus(status)));
  }
}
