export interface Court {
  name: string;
  id: string;
}

export interface Facility {
  slug: string;
  name: string;
  // RPDE live-slots feed for the operator
  feedUrl: string;
  // Substrings of `facilityUse` that identify this facility's squash courts
  facilityUseIds: string[];
  bookingUrl: string;
  courts: [Court, Court];
}

export const ALFRETON_SQUASH: Facility = {
  slug: "alfreton-leisure-centre",
  name: "Alfreton Leisure Centre",
  feedUrl: process.env.FEED_URL || "https://opendata.leisurecloud.live/api/feeds/PlacesLeisure-live-slots",
  facilityUseIds: ["041A000005"],
  bookingUrl: "https://placesleisure.gladstonego.cloud/book/calendar/041A000005",
  courts: [
    { name: "Squash Court 1", id: "041ZSQU001" },
    { name: "Squash Court 2", id: "041ZSQU002" },
  ],
};

// Length of a squash booking, and of the window checked before it
export const WINDOW_MINUTES = 40;

export const FEED_UTC_OFFSET = process.env.FEED_UTC_OFFSET || "+00:00";
export const FEED_MAX_PAGES = parseInt(process.env.FEED_MAX_PAGES || "1000", 10);
export const FEED_TIMEOUT_MS = parseInt(process.env.FEED_TIMEOUT_MS || "30000", 10);
export const FEED_USER_AGENT = process.env.FEED_USER_AGENT || "SquashCourtChecker/1.0";
