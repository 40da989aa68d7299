/**
 * Unit Tests — Person display name and variant guards
 */
import { displayName, isCustomer, isEmployee, type Person } from '@domain/entities/Person';

describe('displayName', () => {
  it('should render "last, first"', () => {
    expect(displayName({ firstName: 'Sandra', lastName: 'Dee' })).toBe('Dee, Sandra');
  });

  it('should substitute NA for a missing last name', () => {
    expect(displayName({ firstName: 'Frenchy', lastName: null })).toBe('NA, Frenchy');
  });

  it('should substitute NA for a missing first name', () => {
    expect(displayName({ firstName: null, lastName: 'Dee' })).toBe('Dee, NA');
  });

  it('should treat an empty string as missing', () => {
    expect(displayName({ firstName: '', lastName: '' })).toBe('NA, NA');
  });
});

describe('person guards', () => {
  const employee: Person = {
    id: 1,
    type: 'employee',
    firstName: null,
    lastName: null,
    foodTruckId: null,
  };
  const customer: Person = { id: 2, type: 'customer', firstName: null, lastName: null };

  it('should narrow on the type tag', () => {
    expect(isEmployee(employee)).toBe(true);
    expect(isCustomer(employee)).toBe(false);
    expect(isCustomer(customer)).toBe(true);
    expect(isEmployee(customer)).toBe(false);
  });
});
