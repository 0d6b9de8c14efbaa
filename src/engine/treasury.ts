import { ensure } from '../core/errors.js';
import { checkedAdd, checkedSub } from '../core/math.js';
import { getBalance, getTreasury, setBalance, updateTreasury, type Db } from '../db/index.js';
import { atomically, requireAuthority, type EngineContext } from './context.js';
import type { Treasury } from '../types.js';

export type TreasuryView = Treasury & { balance: bigint; };

export function transfer(db: Db, from: string, to: string, amount: bigint): void {
    ensure(amount >= 0n, 'InvalidAmount');
    if (amount === 0n || from === to) return;
    const fromBalance = getBalance(db, from);
    ensure(fromBalance >= amount, 'InsufficientBalance', `${from} holds ${fromBalance}, needs ${amount}`);
    setBalance(db, from, checkedSub(fromBalance, amount));
    setBalance(db, to, checkedAdd(getBalance(db, to), amount));
}

export function recordInflow(db: Db, amount: bigint): void {
    const treasury = getTreasury(db);
    updateTreasury(db, { ...treasury, totalIn: checkedAdd(treasury.totalIn, amount) });
}

export function recordOutflow(db: Db, amount: bigint): void {
    const treasury = getTreasury(db);
    updateTreasury(db, { ...treasury, totalOut: checkedAdd(treasury.totalOut, amount) });
}

export function recordFeeWithdrawal(db: Db, amount: bigint): void {
    const treasury = getTreasury(db);
    updateTreasury(db, { ...treasury, totalFeesWithdrawn: checkedAdd(treasury.totalFeesWithdrawn, amount) });
}

/** Credits a player account from outside the system. Authority only. */
export function deposit(ctx: EngineContext, signer: string, account: string, amount: bigint): bigint {
    return atomically(ctx, () => {
        requireAuthority(ctx, signer);
        ensure(amount > 0n, 'InvalidAmount', 'deposit must be positive');
        const balance = checkedAdd(getBalance(ctx.db, account), amount);
        setBalance(ctx.db, account, balance);
        console.log(`[treasury] Deposit ${amount} -> ${account}, balance ${balance}`);
        return balance;
    });
}

export function treasuryView(ctx: EngineContext): TreasuryView {
    return { ...getTreasury(ctx.db), balance: getBalance(ctx.db, ctx.settings.treasury) };
}

export function balanceOf(ctx: EngineContext, account: string): bigint {
    return getBalance(ctx.db, account);
}
