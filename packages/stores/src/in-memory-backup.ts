import { BACKUP, epochSeconds, PreconditionError, type EpochClock } from '@vouchers/kernel';
import { sha256Hex } from '@vouchers/crypto';
import { componentLogger, type Logger, type VoucherBackupPort } from '@vouchers/protocol';
import { BackupPayloadSchema, formatIssues, type BackupPayload } from '@vouchers/schema';
import { signedVoucherFromJson, type SignedVoucher } from '@vouchers/voucher';

export interface InMemoryBackupOptions {
  clock?: EpochClock;
  logger?: Logger;
}

/**
 * Backup store holding one serialized, versioned payload per user
 *
 * Entries are indexed by a SHA-256 of the user key; the key itself is not
 * retained. A voucher backed up twice keeps only its latest copy.
 */
export class InMemoryVoucherBackupStore implements VoucherBackupPort {
  private readonly payloads = new Map<string, string>();
  private readonly clock: EpochClock;
  private readonly log: Logger;

  constructor(options: InMemoryBackupOptions = {}) {
    this.clock = options.clock ?? epochSeconds;
    this.log = options.logger ?? componentLogger('memory-backup');
  }

  async backup(vouchers: readonly SignedVoucher[], userKey: string): Promise<void> {
    const slot = await sha256Hex(userKey);
    const existing = this.read(slot);

    const byId = new Map<string, SignedVoucher>();
    for (const voucher of [...existing, ...vouchers]) {
      byId.delete(voucher.voucherId);
      byId.set(voucher.voucherId, voucher);
    }

    const payload: BackupPayload = {
      version: BACKUP.payloadVersion,
      createdAt: this.clock(),
      vouchers: [...byId.values()].map((v) => v.toJSON()),
    };
    this.payloads.set(slot, JSON.stringify(payload));
    this.log.debug({ count: vouchers.length, total: byId.size }, 'Backup written');
  }

  async restore(userKey: string): Promise<SignedVoucher[]> {
    return this.read(await sha256Hex(userKey));
  }

  async hasBackups(userKey: string): Promise<boolean> {
    return this.payloads.has(await sha256Hex(userKey));
  }

  async deleteBackups(userKey: string): Promise<void> {
    this.payloads.delete(await sha256Hex(userKey));
  }

  private read(slot: string): SignedVoucher[] {
    const text = this.payloads.get(slot);
    if (text === undefined) {
      return [];
    }
    const result = BackupPayloadSchema.safeParse(JSON.parse(text));
    if (!result.success) {
      throw new PreconditionError(`Corrupt backup payload: ${formatIssues(result.error)}`);
    }
    return result.data.vouchers.map((json) => signedVoucherFromJson(json));
  }
}
