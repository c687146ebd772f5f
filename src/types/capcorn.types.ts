// ============================================================================
// CAPCORN TYPES
// Domain records exchanged with the CapCorn reservation backend
// ============================================================================

// ----------------------------------------------------------------------------
// CODE TABLES
// ----------------------------------------------------------------------------

/** 0 = German, 1 = English */
export type CapCornLanguage = 0 | 1;

export type SearchLanguage = "de" | "en";

export const MealPlan = {
  BREAKFAST: 1,
  HALF_BOARD: 2,
  FULL_BOARD: 3,
  NO_MEALS: 4,
  ALL_INCLUSIVE: 5,
} as const;

export type MealPlanCode = (typeof MealPlan)[keyof typeof MealPlan];

// ----------------------------------------------------------------------------
// PARTY
// ----------------------------------------------------------------------------

export interface Child {
  age: number;
}

export interface PartySpec {
  adults: number;
  children: Child[];
}

// ----------------------------------------------------------------------------
// ROOM AVAILABILITY
// ----------------------------------------------------------------------------

export interface RoomAvailabilityRequest {
  language: CapCornLanguage;
  hotelId: string;
  arrival: string;
  departure: string;
  rooms: PartySpec[];
}

export interface RoomOption {
  readonly categoryCode: string;
  readonly typeName: string;
  readonly description: string;
  readonly sizeSqm: number;
  readonly totalPrice: number;
  readonly pricePerPerson: number;
  readonly pricePerAdult: number;
  readonly pricePerNight: number;
  /** Meal plan as CapCorn reports it (see `MealPlan`) */
  readonly boardCode: number;
  /** 1 hotel room, 2 apartment / holiday home; other codes pass through */
  readonly roomTypeCode: number;
}

export interface AvailableRoom {
  arrival: string;
  departure: string;
  adults: number;
  children: Child[];
  options: RoomOption[];
}

export interface AvailabilityMember {
  hotelId: string;
  rooms: AvailableRoom[];
}

export interface AvailabilityResult {
  members: AvailabilityMember[];
}

// ----------------------------------------------------------------------------
// RESERVATION
// ----------------------------------------------------------------------------

export interface GuestCount {
  /** 10 = adult, 8 = child */
  ageQualifyingCode: number;
  count: number;
  age?: number;
}

export interface ReservationService {
  name: string;
  quantity: number;
  amountAfterTax: number;
}

export interface GuestAddress {
  addressLine: string;
  cityName: string;
  postalCode: string;
  countryCode: string;
}

export interface GuestInfo {
  namePrefix: string;
  givenName: string;
  surname: string;
  phoneNumber: string;
  email: string;
  address: GuestAddress;
}

export interface ReservationRequest {
  hotelId: string;
  roomTypeCode: string;
  numberOfUnits: number;
  mealPlan: MealPlanCode;
  guestCounts: GuestCount[];
  arrival: string;
  departure: string;
  totalAmount: number;
  guest: GuestInfo;
  services: ReservationService[];
  bookingComment?: string;
  reservationId: string;
  source: string;
}

export interface ReservationResult {
  success: boolean;
  message: string;
  reservationId?: string;
  errors?: string[];
}
