// Factory for creating specialist instances by domain
// The set of specialists is closed: one per SpecialistDomain

import type { SpecialistDomain } from '../types/findings.js';
import type { BaseSpecialist } from '../agents/base-specialist.js';
import { DataSpecialist } from '../agents/data-specialist.js';
import { NetworkSpecialist } from '../agents/network-specialist.js';
import { PlatformSpecialist } from '../agents/platform-specialist.js';
import { ReliabilitySpecialist } from '../agents/reliability-specialist.js';
import { SecuritySpecialist } from '../agents/security-specialist.js';

const FACTORY: Record<SpecialistDomain, () => BaseSpecialist> = {
  data: () => new DataSpecialist(),
  network: () => new NetworkSpecialist(),
  platform: () => new PlatformSpecialist(),
  reliability: () => new ReliabilitySpecialist(),
  security: () => new SecuritySpecialist(),
};

export function createSpecialist(domain: SpecialistDomain): BaseSpecialist {
  return FACTORY[domain]();
}
