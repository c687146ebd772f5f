// ============================================================================
// REQUEST VALIDATION SCHEMAS
// Schemas for all REST operation requests
// ============================================================================

import { z } from "zod";
import { daysBetween } from "../utils/dates.js";
import {
  capcornLanguageSchema,
  childrenSchema,
  dateSchema,
  languageSchema,
  MAX_ROOMS_PER_SEARCH,
  roomPartySchema,
} from "./common.schema.js";

// ----------------------------------------------------------------------------
// ROOM SEARCH (date-window sweep)
// ----------------------------------------------------------------------------

export const timespanSchema = z
  .object({
    from: dateSchema,
    to: dateSchema,
  })
  .refine((span) => daysBetween(span.from, span.to) > 0, {
    message: "'to' date must be after 'from' date",
    path: ["to"],
  });

export const roomSearchRequestSchema = z
  .object({
    language: languageSchema.default("de"),
    timespan: timespanSchema,
    duration: z.number().int().min(1),
    adults: z.number().int().min(1),
    children: childrenSchema,
  })
  .superRefine((request, ctx) => {
    const width = daysBetween(request.timespan.from, request.timespan.to);
    if (request.duration > width) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["duration"],
        message: `Duration (${request.duration} days) cannot exceed timespan (${width} days)`,
      });
    }
  });

export type RoomSearchRequestInput = z.infer<typeof roomSearchRequestSchema>;

// ----------------------------------------------------------------------------
// ROOM AVAILABILITY (single date range, CapCorn shape)
// ----------------------------------------------------------------------------

export const roomAvailabilityRequestSchema = z
  .object({
    language: capcornLanguageSchema.default(0),
    hotelId: z.string().min(1),
    arrival: dateSchema,
    departure: dateSchema,
    rooms: z
      .array(roomPartySchema)
      .min(1)
      .max(MAX_ROOMS_PER_SEARCH, `Maximum ${MAX_ROOMS_PER_SEARCH} rooms per search`),
  })
  .refine((request) => daysBetween(request.arrival, request.departure) > 0, {
    message: "Departure date must be after arrival date",
    path: ["departure"],
  });

export type RoomAvailabilityRequestInput = z.infer<typeof roomAvailabilityRequestSchema>;

// ----------------------------------------------------------------------------
// RESERVATION
// ----------------------------------------------------------------------------

export const guestCountSchema = z.object({
  ageQualifyingCode: z.number().int(),
  count: z.number().int().min(1),
  age: z.number().int().min(1).max(17).optional(),
});

export const addressSchema = z.object({
  addressLine: z.string().min(1),
  cityName: z.string().min(1),
  postalCode: z.string().min(1),
  countryCode: z.string().length(2),
});

export const guestSchema = z.object({
  namePrefix: z.string(),
  givenName: z.string().min(1),
  surname: z.string().min(1),
  phoneNumber: z.string().min(1),
  email: z.string().email(),
  address: addressSchema,
});

export const serviceSchema = z.object({
  name: z.string().min(1),
  quantity: z.number().int().min(1),
  amountAfterTax: z.number().min(0),
});

export const reservationRequestSchema = z
  .object({
    hotelId: z.string().min(1),
    roomTypeCode: z.string().min(1).max(8),
    numberOfUnits: z.number().int().min(1).default(1),
    mealPlan: z.union([z.literal(1), z.literal(2), z.literal(3), z.literal(4), z.literal(5)]),
    guestCounts: z.array(guestCountSchema).min(1),
    arrival: dateSchema,
    departure: dateSchema,
    totalAmount: z.number().min(0),
    guest: guestSchema,
    services: z.array(serviceSchema).default([]),
    bookingComment: z.string().max(200).optional(),
    reservationId: z.string().min(1),
    source: z.string().min(1).default("Hackathon"),
  })
  .refine((request) => daysBetween(request.arrival, request.departure) > 0, {
    message: "Departure date must be after arrival date",
    path: ["departure"],
  });

export type ReservationRequestInput = z.infer<typeof reservationRequestSchema>;

// ----------------------------------------------------------------------------
// ANALYTICS
// ----------------------------------------------------------------------------

export const analyticsQuerySchema = z.object({
  hours: z.coerce.number().int().min(1).max(24).default(24),
});

export type AnalyticsQueryInput = z.infer<typeof analyticsQuerySchema>;
