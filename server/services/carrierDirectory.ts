/**
 * Carrier Directory
 *
 * CRUD over carriers and their officers, and read access to insurance
 * providers with the carriers they insure.
 */

import { createHash } from 'node:crypto';
import type {
  Carrier,
  CarrierPatch,
  InsertCarrier,
  InsuranceProvider,
  Person,
} from '@shared/schema';
import type { IGraphStorage, PageOptions } from '../storage/types';
import { DuplicateKeyError, NotFoundError, ValidationError } from '../lib/errors';
import { loggers } from '../lib/logger';
import type { RelationshipFabric } from './relationshipFabric';

const log = loggers.api.child({ component: 'carrier-directory' });

export function normalizePersonName(fullName: string): string {
  return fullName.toLowerCase().split(/\s+/).filter(Boolean).join(' ');
}

/** Stable id for a person: the same name always maps to the same id. */
export function personIdFor(fullName: string, dateOfBirth?: string): string {
  const normalized = normalizePersonName(fullName);
  const key = dateOfBirth ? `${normalized}:${dateOfBirth}` : normalized;
  return 'P' + createHash('md5').update(key).digest('hex').slice(0, 10).toUpperCase();
}

export interface ProviderWithCarriers {
  provider: InsuranceProvider;
  carriers: Carrier[];
}

export class CarrierDirectory {
  constructor(
    private readonly storage: IGraphStorage,
    private readonly fabric: RelationshipFabric,
  ) {}

  async createCarrier(input: InsertCarrier): Promise<Carrier> {
    const created = await this.storage.createCarrier(input);
    if (!created) {
      throw new DuplicateKeyError('Carrier', input.usdot);
    }
    log.info({ carrierUsdot: created.usdot }, 'Carrier created');
    return created;
  }

  async getCarrier(usdot: number): Promise<Carrier> {
    const carrier = await this.storage.getCarrier(usdot);
    if (!carrier) {
      throw new NotFoundError('Carrier', usdot);
    }
    return carrier;
  }

  async listCarriers(options: PageOptions = {}): Promise<Carrier[]> {
    return this.storage.listCarriers(options);
  }

  async updateCarrier(usdot: number, patch: CarrierPatch): Promise<Carrier> {
    const updated = await this.storage.updateCarrier(usdot, patch);
    if (!updated) {
      throw new NotFoundError('Carrier', usdot);
    }
    return updated;
  }

  /** Deletes the carrier and detaches every relationship it has. */
  async deleteCarrier(usdot: number): Promise<void> {
    const policies = await this.storage.listPoliciesByCarrier(usdot);
    if (!(await this.storage.deleteCarrier(usdot))) {
      throw new NotFoundError('Carrier', usdot);
    }
    for (const name of new Set(policies.map((policy) => policy.providerName))) {
      await this.fabric.recomputeProviderCarrierCount(name);
    }
    log.info({ carrierUsdot: usdot }, 'Carrier deleted');
  }

  async listOfficers(usdot: number): Promise<Person[]> {
    await this.getCarrier(usdot);
    return this.storage.listOfficers(usdot);
  }

  /** Gets or creates the person by normalized name and links them as an officer. */
  async attachOfficer(usdot: number, fullName: string): Promise<Person> {
    const trimmed = fullName.trim();
    if (!trimmed) {
      throw new ValidationError('fullName is required', { field: 'fullName' });
    }
    await this.getCarrier(usdot);

    const parts = trimmed.split(/\s+/);
    const person = await this.storage.upsertPerson({
      personId: personIdFor(trimmed),
      fullName: trimmed,
      firstName: parts.length > 1 ? parts[0] : null,
      lastName: parts.length > 1 ? parts[parts.length - 1] : null,
    });
    await this.storage.linkOfficer(usdot, person.personId);
    return person;
  }

  async listProviders(options: PageOptions = {}): Promise<InsuranceProvider[]> {
    return this.storage.listProviders(options);
  }

  async getProvider(name: string): Promise<ProviderWithCarriers> {
    const provider = await this.storage.getProviderByName(name);
    if (!provider) {
      throw new NotFoundError('Insurance provider', name);
    }
    const carriers = await this.storage.listCarriersForProvider(provider.providerId);
    return { provider, carriers };
  }

  async recountProvider(name: string): Promise<InsuranceProvider> {
    const provider = await this.fabric.recomputeProviderCarrierCount(name);
    if (!provider) {
      throw new NotFoundError('Insurance provider', name);
    }
    return provider;
  }
}
