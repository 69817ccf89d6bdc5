import type { ProductRecord } from "@shelf-guide/shared";
import { CATALOG_COLUMNS } from "@shelf-guide/shared";

export const POSITIONING_INSTRUCTIONS = `You help a blind shopper aim a chest-mounted camera at a store shelf.
Decide whether the whole shelf section is in frame: no products cut off at the left, right, top or bottom edge.
When it is not, give ONE short spoken correction such as "Move a little to the right", "Tilt up slightly" or "Step back".

Answer with JSON only:
{"framed": boolean, "confidence": number between 0 and 1, "correction": string}
Use an empty correction when framed is true.`;

export const POSITIONING_PROMPT = "Is the full shelf visible in this photo?";

export const IDENTIFICATION_INSTRUCTIONS = `You read store shelves for a blind shopper.
List every distinct product visible in the photo as CSV with exactly this header:
${CATALOG_COLUMNS.join(",")}

- item_number counts up from 1 in reading order (top shelf first, left to right).
- product_name is the product and size, e.g. "Cola 330ml".
- brand is the brand on the pack, or "Unknown".
- location uses top/middle/bottom shelf and left/center/right, e.g. "middle shelf, right".
- price is the shelf-label price as a plain number, or N/A when no label is readable.
- Quote any value that contains a comma.
- If no products are visible, output the header line only.
Output the CSV and nothing else: no prose, no code fences.`;

export const IDENTIFICATION_PROMPT = "List every product on this shelf.";

export const guidanceInstructions = (target: ProductRecord): string => `You guide a blind shopper's hand to one product on a shelf.
Target product: ${target.name} (${target.brand}), last seen at: ${target.location}.

Find the shopper's hand and the target in the photo and report where the target lies relative to the hand:
- angle_degrees: direction from the hand to the target, clockwise from straight up (0 = up, 90 = right, 180 = down, 270 = left).
- distance: "near" when the hand is within a few centimetres of the target, otherwise "far".
- target_visible: false when the target cannot be seen in this photo.

Answer with JSON only:
{"target_visible": boolean, "angle_degrees": number, "distance": "near" | "far"}`;

export const guidancePrompt = (target: ProductRecord): string => `Where is the ${target.name} relative to my hand?`;
