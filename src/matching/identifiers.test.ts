import { describe, it, expect } from 'vitest';
import { cmToInchClass, extractIdentifiers, toIdentifierTokens } from './identifiers';

const sorted = (values: Iterable<string>) => [...values].sort();

describe('extractIdentifiers', () => {
    it('should parse a phone title into brand, storage, color and generation', () => {
        const ids = extractIdentifiers('Apple iPhone 15 (128 GB) - Black');

        expect(sorted(ids.brands)).toEqual(['apple', 'iphone']);
        expect(sorted(ids.brandFamilies)).toEqual(['apple']);
        expect(ids.condition).toBe('new');
        expect(ids.kind).toBe('main');
        expect(sorted(ids.storage)).toEqual(['128gb']);
        expect(sorted(ids.colors)).toEqual(['black']);
        expect(sorted(ids.phoneModels)).toEqual(['iphone15']);
        expect(ids.iphoneGeneration).toBe(15);
        expect(ids.screenInches).toBeNull();
    });

    it('should render the prefixed token set', () => {
        const tokens = toIdentifierTokens(extractIdentifiers('Apple iPhone 15 (128 GB) - Black'));

        expect(sorted(tokens)).toEqual(sorted([
            'apple',
            'iphone',
            'brandfamily_apple',
            'flag_new',
            'flag_main_product',
            'storage_128gb',
            'color_black',
            'iphone15',
            'iphone_gen_15'
        ]));
    });

    it('should tag capacities by the nearest keyword', () => {
        const ids = extractIdentifiers('Samsung Galaxy S23 Ultra 5G (Green, 12GB RAM, 256GB Storage)');

        expect(sorted(ids.ram)).toEqual(['12gb']);
        expect(sorted(ids.storage)).toEqual(['256gb']);
        expect(sorted(ids.phoneModels)).toEqual(['galaxys23', 's23ultra']);
        expect(sorted(ids.variants)).toEqual(['ultra']);
    });

    it('should take the largest untagged capacity as storage', () => {
        const ids = extractIdentifiers('Redmi Note 13 8GB 256GB');

        expect(sorted(ids.storage)).toEqual(['256gb']);
        expect(ids.ram.size).toBe(0);
    });

    it('should format terabytes and whole multiples of 1024GB the same way', () => {
        expect(sorted(extractIdentifiers('Seagate 1TB External Hard Drive').storage)).toEqual(['1tb']);
        expect(sorted(extractIdentifiers('Laptop 1024GB SSD').storage)).toEqual(['1tb']);
    });

    it('should map centimetre TV sizes to their inch class', () => {
        expect(cmToInchClass(108)).toBe(43);
        expect(cmToInchClass(139)).toBe(55);
        expect(cmToInchClass(100)).toBe(39);
        expect(extractIdentifiers('Sony Bravia 108 cm (43 inches) 4K Ultra HD Smart LED Google TV').screenInches).toBe(43);
    });

    it('should only emit family tokens for brands that belong to a family', () => {
        const ids = extractIdentifiers('Samsung Galaxy M14 5G (Smoky Teal, 6GB, 128GB Storage)');

        expect(sorted(ids.brands)).toEqual(['samsung']);
        expect(ids.brandFamilies.size).toBe(0);
        expect([...toIdentifierTokens(ids)].filter(token => token.startsWith('brandfamily_'))).toEqual([]);
        expect(sorted(extractIdentifiers('POCO X5 Pro 5G').brandFamilies)).toEqual(['xiaomi']);
    });

    it('should read decimal centimetre sizes and prefer a stated inch size', () => {
        expect(extractIdentifiers('Samsung Galaxy S23 5G (Green, 128GB Storage) | 15.49 cm (6.1 inch) Display').screenInches).toBe(6);
        expect(extractIdentifiers('Samsung Galaxy S23 5G (Green, 128 GB) 15.5 cm Display').screenInches).toBe(6);
        expect(extractIdentifiers('Lenovo IdeaPad Slim 3 39.62 cm (15.6 inch) Laptop').screenInches).toBe(15.6);
        expect(extractIdentifiers('Lenovo IdeaPad Slim 3 39.62 cm Laptop').screenInches).toBe(16);
    });

    it('should flag refurbished listings and accessories', () => {
        expect(extractIdentifiers('Unboxed Apple iPhone 15 (Blue, 128 GB)').condition).toBe('refurbished');
        expect(extractIdentifiers('Spigen Ultra Hybrid Back Cover Case for iPhone 15 (Crystal Clear)').kind).toBe('accessory');
        expect(extractIdentifiers('Fast Charger compatible with Samsung Galaxy').kind).toBe('accessory');
    });

    it('should expand pro max and plus-suffix variants', () => {
        const proMax = extractIdentifiers('Apple iPhone 15 Pro Max (256 GB)');
        expect(sorted(proMax.variants)).toEqual(['max', 'pro']);
        expect(sorted(proMax.phoneModels)).toEqual(['iphone15promax']);

        const plus = extractIdentifiers('Samsung Galaxy S23+');
        expect(sorted(plus.variants)).toEqual(['plus']);
        expect(plus.phoneModels.has('s23plus')).toBe(true);
    });

    it('should apply the bare HD guard to resolutions', () => {
        expect(sorted(extractIdentifiers('Samsung 80 cm (32 inches) HD Smart LED TV').resolutions)).toEqual(['hd']);
        expect(sorted(extractIdentifiers('LG 80 cm (32 inches) Full HD Smart LED TV').resolutions)).toEqual(['fhd']);
        expect(sorted(extractIdentifiers('Sony Bravia 4K Ultra HD TV').resolutions)).toEqual(['4k']);
    });

    it('should read units but skip network generations', () => {
        expect(extractIdentifiers('OnePlus Nord CE 3 Lite 5G').units.size).toBe(0);
        expect(sorted(extractIdentifiers('Basmati Rice 5kg Pack of 2').units)).toEqual(['5kg', 'packof2']);
        expect(sorted(extractIdentifiers('Green Tea 500g').units)).toEqual(['500g']);
    });

    it('should read wattage and jar counts', () => {
        const ids = extractIdentifiers('Prestige Iris 750 Watt Mixer Grinder with 3 Jars');

        expect(ids.wattage).toBe(750);
        expect(ids.jars).toBe(3);
    });

    it('should keep alphanumeric model numbers and drop unit-shaped tokens', () => {
        const ids = extractIdentifiers('SONY Bravia X74L 108 cm (43 inch) Ultra HD (4K) LED Smart Google TV (KD-43X74L)');

        expect(sorted(ids.models)).toEqual(['kd43x74l', 'x74l']);
        expect(sorted(ids.series)).toEqual(['bravia', 'googletv']);
    });

    it('should be case-insensitive', () => {
        const lower = toIdentifierTokens(extractIdentifiers('apple iphone 15 (128 gb) - black'));
        const upper = toIdentifierTokens(extractIdentifiers('APPLE IPHONE 15 (128 GB) - BLACK'));

        expect(sorted(upper)).toEqual(sorted(lower));
    });
});
