import { describe, it, expect } from 'vitest';
import { extractIdentifiers } from './identifiers';
import { findConflict, veto } from './veto';

const conflictOf = (titleA: string, titleB: string) =>
    findConflict(extractIdentifiers(titleA), extractIdentifiers(titleB));

describe('findConflict', () => {
    it('should keep accessories away from devices', () => {
        expect(conflictOf(
            'Spigen Ultra Hybrid Back Cover Case for iPhone 15 (Crystal Clear)',
            'Apple iPhone 15 (Black, 128 GB)'
        )).toBe('accessory');
    });

    it('should keep refurbished units away from new ones', () => {
        expect(conflictOf('Apple iPhone 15 (Blue, 128 GB)', 'Unboxed Apple iPhone 15 (Blue, 128 GB)')).toBe('condition');
    });

    it('should reject different brands', () => {
        expect(conflictOf(
            'boAt Airdopes 141 Bluetooth Earbuds (Bold Black)',
            'Samsung Galaxy Buds2 Pro (Graphite)'
        )).toBe('brand');
    });

    it('should accept sub-brands of the same family', () => {
        expect(conflictOf('Poco X6 Pro 5G', 'Xiaomi X6 Pro 5G')).toBeNull();
    });

    it('should reject different storage', () => {
        expect(conflictOf(
            'Samsung Galaxy S23 Ultra 5G (Green, 12GB RAM, 256GB Storage)',
            'Samsung Galaxy S23 Ultra 5G (Green, 12GB RAM, 512GB Storage)'
        )).toBe('storage');
    });

    it('should reject TVs of different sizes', () => {
        expect(conflictOf(
            'Sony Bravia 108 cm (43 inches) 4K Ultra HD Smart LED Google TV',
            'Sony Bravia 139 cm (55 inches) 4K Ultra HD Smart LED Google TV'
        )).toBe('screen-size');
    });

    it('should read decimal centimetre sizes without inventing a screen-size conflict', () => {
        expect(conflictOf(
            'Samsung Galaxy S23 5G (Green, 128GB Storage) | 15.49 cm (6.1 inch) Display',
            'Samsung Galaxy S23 5G (Green, 128 GB) 15.5 cm Display'
        )).toBeNull();
        expect(conflictOf(
            'Lenovo IdeaPad Slim 3 Intel Core i5 39.62 cm (15.6 inch) Laptop',
            'Lenovo IdeaPad Slim 3 Intel Core i5 39.62 cm Laptop'
        )).toBeNull();
    });

    it('should reject TVs of different resolutions', () => {
        expect(conflictOf(
            'Samsung 80 cm (32 inches) HD Ready Smart LED TV',
            'Samsung 80 cm (32 inches) Full HD Smart LED TV'
        )).toBe('resolution');
    });

    it('should reject appliances with different wattage or jar count', () => {
        expect(conflictOf(
            'Prestige Iris 750 Watt Mixer Grinder with 3 Jars',
            'Prestige Iris 500 Watt Mixer Grinder with 3 Jars'
        )).toBe('wattage');
        expect(conflictOf(
            'Prestige Iris 750 Watt Mixer Grinder with 3 Jars',
            'Prestige Iris 750 Watt Mixer Grinder with 2 Jars'
        )).toBe('jars');
    });

    it('should reject different product lines', () => {
        expect(conflictOf('Lenovo IdeaPad Slim 3 Intel Core i5 Laptop', 'Lenovo Legion 5 Intel Core i5 Laptop')).toBe('series');
    });

    it('should reject disjoint strict variants', () => {
        expect(conflictOf('Apple iPhone 15 Pro (128 GB)', 'Apple iPhone 15 Plus (128 GB)')).toBe('variant');
    });

    it('should reject different iPhone generations', () => {
        expect(conflictOf('Apple iPhone 14 (128 GB) - Black', 'Apple iPhone 15 (128 GB) - Black')).toBe('iphone-generation');
    });

    it('should not treat a missing attribute as a conflict', () => {
        expect(conflictOf('Apple iPhone 15', 'Apple iPhone 15 (128 GB)')).toBeNull();
    });

    it('should let overlapping variants through', () => {
        // "Pro" and "Pro Max" share "pro"; telling them apart is left to the scores
        expect(conflictOf('Apple iPhone 15 Pro (256 GB)', 'Apple iPhone 15 Pro Max (256 GB)')).toBeNull();
    });
});

describe('veto', () => {
    it('should be the boolean form of findConflict', () => {
        const phone = extractIdentifiers('Apple iPhone 15 (128 GB) - Black');

        expect(veto(phone, extractIdentifiers('Apple iPhone 15 (Black, 128 GB)'))).toBe(false);
        expect(veto(phone, extractIdentifiers('Apple iPhone 14 (Black, 128 GB)'))).toBe(true);
    });
});
