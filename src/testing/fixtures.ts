/**
 * Record builders shared by tests
 */

import type { Equipment, Location, Vendor } from '../types/inventory.js';

export function makeVendor(id: string, name: string, overrides: Partial<Vendor> = {}): Vendor {
  return {
    id,
    name,
    isActive: true,
    needsCompletion: false,
    company: null,
    email: null,
    phone: null,
    address: null,
    city: null,
    specialization: null,
    isSupplier: false,
    ...overrides,
  };
}

export function makeLocation(id: string, name: string, overrides: Partial<Location> = {}): Location {
  return {
    id,
    name,
    isActive: true,
    needsCompletion: false,
    floor: null,
    department: null,
    building: null,
    notes: null,
    ...overrides,
  };
}

export function makeEquipment(id: string, name: string, overrides: Partial<Equipment> = {}): Equipment {
  return {
    id,
    name,
    isActive: true,
    needsCompletion: false,
    category: 'electromedical',
    brand: null,
    model: null,
    serialNumber: null,
    barcode: null,
    location: 'Radiologia',
    locationId: null,
    supplierId: null,
    warrantyMonths: null,
    warrantyVendorId: null,
    maintenanceFrequencyMonths: null,
    lastMaintenanceDate: null,
    notes: null,
    ...overrides,
  };
}
