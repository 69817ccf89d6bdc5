import type { ProductCatalog, ProductRecord } from "@shelf-guide/shared";

export const PHRASES = {
  adjustFraming: "Move the camera so the whole shelf is in view.",
  shelfFramed: "The shelf is in view. Hold still and take a close photo.",
  noProducts: "I couldn't find any products. Let's line up the shelf again.",
  retakePhoto: "I couldn't read that photo. Please take another one.",
  visionApology: "Sorry, I'm having trouble seeing right now. Please take another photo.",
  notRecognized: "Item not recognized, please repeat.",
  tryLater: "Sorry, something went wrong on my side. Please try again later.",
  cancelled: "Okay, cancelled. Point the camera at the shelf when you're ready.",
} as const;

const describeItem = (item: ProductRecord): string => {
  const price = item.price === null ? "" : `, ${item.price.toFixed(2)}`;
  return `${item.itemNumber}: ${item.name} by ${item.brand}, ${item.location}${price}.`;
};

export const catalogSummary = (catalog: ProductCatalog): string => {
  const count = catalog.length === 1 ? "1 product" : `${catalog.length} products`;
  return `I found ${count}. ${catalog.map(describeItem).join(" ")} Which one would you like?`;
};

export const guideTo = (item: ProductRecord): string =>
  `Let's find the ${item.name}. Hold your hand up in front of the shelf.`;

export const cannotSeeTarget = (item: ProductRecord): string =>
  `I can't see the ${item.name}. Move your hand slowly along the shelf.`;

export const targetLost = (item: ProductRecord): string =>
  `I've lost the ${item.name}. Point the camera at the shelf again.`;

export const reached = (item: ProductRecord): string => `You've reached the ${item.name}.`;
