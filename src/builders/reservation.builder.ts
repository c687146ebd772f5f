// ============================================================================
// RESERVATION XML BUILDER
// OTA_HotelResNotifRQ as accepted by CapCorn
// ============================================================================

import {
  OTA_NAMESPACES,
  XML_DECLARATION,
  escapeXml,
  formatAmount,
  formatDateTime,
  optional,
} from "./base.builder.js";
import type { GuestCount, ReservationRequest, ReservationService } from "../types/capcorn.types.js";

export interface ReservationBuildOptions {
  /** Creation timestamp written to CreateDateTime (defaults to now) */
  createdAt?: Date;
}

function buildGuestCount(guestCount: GuestCount): string {
  const age = optional(guestCount.age, ` Age="${escapeXml(guestCount.age)}"`);
  return `
            <GuestCount AgeQualifyingCode="${escapeXml(guestCount.ageQualifyingCode)}" Count="${escapeXml(guestCount.count)}"${age}/>`;
}

function buildService(service: ReservationService): string {
  return `
        <Service Quantity="${escapeXml(service.quantity)}">
          <ServiceDetails>
            <ServiceDescription Name="${escapeXml(service.name)}"/>
          </ServiceDetails>
          <Price>
            <Base AmountAfterTax="${formatAmount(service.amountAfterTax)}"/>
          </Price>
        </Service>`;
}

export function buildReservationXml(
  input: ReservationRequest,
  options?: ReservationBuildOptions
): string {
  const createdAt = options?.createdAt ?? new Date();
  const guestCounts = input.guestCounts.map(buildGuestCount).join("");

  const services =
    input.services.length > 0
      ? `
      <Services>${input.services.map(buildService).join("")}
      </Services>`
      : "";

  const comments = optional(
    input.bookingComment,
    `
          <Comments>
            <Comment>
              <ListItem>${escapeXml(input.bookingComment)}</ListItem>
            </Comment>
          </Comments>`
  );

  const { guest } = input;

  const xml = `${XML_DECLARATION}
<OTA_HotelResNotifRQ xmlns="${OTA_NAMESPACES.ota}" xmlns:xsd="${OTA_NAMESPACES.xsd}" xmlns:xsi="${OTA_NAMESPACES.xsi}" Version="1">
  <POS>
    <Source AgentDutyCode="${escapeXml(input.source)}"/>
  </POS>
  <HotelReservations>
    <HotelReservation CreateDateTime="${formatDateTime(createdAt)}" ResStatus="Book">
      <RoomStays>
        <RoomStay>
          <RoomTypes>
            <RoomType NumberOfUnits="${escapeXml(input.numberOfUnits)}" RoomTypeCode="${escapeXml(input.roomTypeCode)}"/>
          </RoomTypes>
          <RatePlans>
            <RatePlan>
              <MealsIncluded MealPlanCodes="${escapeXml(input.mealPlan)}"/>
            </RatePlan>
          </RatePlans>
          <GuestCounts IsPerRoom="true">${guestCounts}
          </GuestCounts>
          <TimeSpan Start="${escapeXml(input.arrival)}" End="${escapeXml(input.departure)}"/>
          <Total AmountAfterTax="${formatAmount(input.totalAmount)}" CurrencyCode="EUR"/>
          <BasicPropertyInfo HotelCode="${escapeXml(input.hotelId)}"/>
        </RoomStay>
      </RoomStays>${services}
      <ResGuests>
        <ResGuest>
          <Profiles>
            <ProfileInfo>
              <Profile>
                <Customer Language="de">
                  <PersonName>
                    <NamePrefix>${escapeXml(guest.namePrefix)}</NamePrefix>
                    <GivenName>${escapeXml(guest.givenName)}</GivenName>
                    <Surname>${escapeXml(guest.surname)}</Surname>
                  </PersonName>
                  <Telephone PhoneNumber="${escapeXml(guest.phoneNumber)}"/>
                  <Email>${escapeXml(guest.email)}</Email>
                  <Address>
                    <AddressLine>${escapeXml(guest.address.addressLine)}</AddressLine>
                    <CityName>${escapeXml(guest.address.cityName)}</CityName>
                    <PostalCode>${escapeXml(guest.address.postalCode)}</PostalCode>
                    <CountryName Code="${escapeXml(guest.address.countryCode)}"/>
                  </Address>
                </Customer>
              </Profile>
            </ProfileInfo>
          </Profiles>${comments}
        </ResGuest>
      </ResGuests>
      <ResGlobalInfo>
        <HotelReservationIDs>
          <HotelReservationID ResID_Value="${escapeXml(input.reservationId)}" ResID_Source="${escapeXml(input.source)}"/>
        </HotelReservationIDs>
      </ResGlobalInfo>
    </HotelReservation>
  </HotelReservations>
</OTA_HotelResNotifRQ>`;

  return xml.trim();
}
