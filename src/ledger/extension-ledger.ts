/**
 * Extension ledger.
 *
 * Tracks each player's time bank and how many extensions they used this
 * turn. A granted extension moves time from the player's bank onto the
 * shared turn clock. Callers hold the session lock; every check and write
 * for one request happens in a single transaction so a rejection leaves
 * nothing behind.
 */

import {
  InsufficientBalanceError,
  InvalidArgumentError,
  LimitExceededError,
  PlayerNotFoundError,
  SessionNotFoundError,
} from '../errors';
import type { HostRepository } from '../db/repository';
import type { SessionId } from '../lifecycle/types';
import type { TimerScheduler } from '../timer/scheduler';
import type { ExtensionGrant, PlayerTimeBank, RegisterPlayerOptions } from './types';

export class ExtensionLedger {
  private repo: HostRepository;
  private scheduler: TimerScheduler;

  constructor(repo: HostRepository, scheduler: TimerScheduler) {
    this.repo = repo;
    this.scheduler = scheduler;
  }

  /**
   * Opens a bank for a player. Registering twice returns the existing bank.
   */
  registerPlayer(sessionId: SessionId, player: string, options: RegisterPlayerOptions = {}): PlayerTimeBank {
    const session = this.repo.getSession(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    const name = player.trim();
    if (name.length === 0) {
      throw new InvalidArgumentError('Player name must not be empty', { sessionId });
    }

    const existing = this.repo.getBank(sessionId, name);
    if (existing) return existing;

    const balanceMs = options.balanceMs ?? session.initialBankMs;
    if (!Number.isFinite(balanceMs) || balanceMs < 0) {
      throw new InvalidArgumentError('Initial balance must be a non-negative number', { sessionId, player: name });
    }

    const bank: PlayerTimeBank = {
      sessionId,
      player: name,
      balanceMs,
      extensionsUsedThisTurn: 0,
      maxExtensionsPerTurn:
        options.maxExtensionsPerTurn === undefined ? session.maxExtensionsPerTurn : options.maxExtensionsPerTurn,
    };
    this.repo.insertBank(bank);
    return bank;
  }

  getBank(sessionId: SessionId, player: string): PlayerTimeBank {
    const bank = this.repo.getBank(sessionId, player);
    if (!bank) {
      throw new PlayerNotFoundError(sessionId, player);
    }
    return bank;
  }

  listBanks(sessionId: SessionId): PlayerTimeBank[] {
    return this.repo.listBanks(sessionId);
  }

  /**
   * Spends `deltaMs` of the player's bank to extend the turn clock.
   */
  requestExtension(sessionId: SessionId, player: string, deltaMs: number): ExtensionGrant {
    if (!Number.isFinite(deltaMs) || deltaMs <= 0) {
      throw new InvalidArgumentError('Extension must be a positive duration', { sessionId, player });
    }

    return this.repo.transaction(() => {
      const bank = this.getBank(sessionId, player);

      const limit = bank.maxExtensionsPerTurn;
      if (limit !== null && bank.extensionsUsedThisTurn >= limit) {
        throw new LimitExceededError(sessionId, player, limit);
      }
      if (bank.balanceMs < deltaMs) {
        throw new InsufficientBalanceError(sessionId, player, bank.balanceMs, deltaMs);
      }

      const updated: PlayerTimeBank = {
        ...bank,
        balanceMs: bank.balanceMs - deltaMs,
        extensionsUsedThisTurn: bank.extensionsUsedThisTurn + 1,
      };
      this.repo.saveBank(updated);
      const timer = this.scheduler.extend(sessionId, deltaMs);
      return { bank: updated, timer };
    });
  }

  /**
   * Operator grant (positive) or charge (negative) against a bank.
   */
  adjustBalance(sessionId: SessionId, player: string, deltaMs: number): PlayerTimeBank {
    if (!Number.isFinite(deltaMs)) {
      throw new InvalidArgumentError('Balance adjustment must be a finite number', { sessionId, player });
    }
    return this.repo.transaction(() => {
      const bank = this.getBank(sessionId, player);
      if (bank.balanceMs + deltaMs < 0) {
        throw new InsufficientBalanceError(sessionId, player, bank.balanceMs, -deltaMs);
      }
      const updated: PlayerTimeBank = { ...bank, balanceMs: bank.balanceMs + deltaMs };
      this.repo.saveBank(updated);
      return updated;
    });
  }

  /**
   * New turn: clears the extension counters and adds the per-turn bonus.
   */
  resetTurn(sessionId: SessionId, bonusMs: number = 0): PlayerTimeBank[] {
    const bonus = Math.max(0, bonusMs);
    return this.repo.transaction(() =>
      this.repo.listBanks(sessionId).map((bank) => {
        const updated: PlayerTimeBank = {
          ...bank,
          balanceMs: bank.balanceMs + bonus,
          extensionsUsedThisTurn: 0,
        };
        this.repo.saveBank(updated);
        return updated;
      })
    );
  }
}
