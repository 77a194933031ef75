/**
 * CSS selectors for the storefront's search and detail pages.
 * Arrays are fallback chains, tried in order.
 */
export const SELECTORS = {
  searchResult: 'div[data-component-type="s-search-result"]',
  resultLink: "a.a-link-normal[href]",

  title: ["#productTitle", "#title", 'meta[property="og:title"]'],
  identifierInput: 'input[name="ASIN"]',
  price: [
    ".a-price .a-offscreen",
    "#priceblock_ourprice",
    "#priceblock_dealprice",
    ".a-price-whole",
  ],
  rating: ['span[data-hook="rating-out-of-text"]', "i.a-icon-star span"],
  reviewCount: ["#acrCustomerReviewText", 'span[data-hook="total-review-count"]'],
  brand: ["#bylineInfo", "a#brand"],
  image: ["#landingImage", "#imgBlkFront"],
  bullets: "#feature-bullets ul li span.a-list-item",
  breadcrumbs: "#wayfinding-breadcrumbs_feature_div ul li a",

  /** Detail tables and lists scanned for dimensions and weight, in priority order */
  detailContainers: [
    "table.prodDetTable",
    "#productDetails_techSpec_section_1",
    "#detailBullets_feature_div",
    "#productOverview_feature_div",
  ],
  detailRows: "tr, li, .a-list-item",
} as const;

export const DIMENSION_LABEL =
  /^(Product Dimensions|Package Dimensions|Item Dimensions L x W x H|Item Dimensions|Item Display Dimensions|Dimensions|Size)\s*[:\s]*/i;

export const WEIGHT_LABEL = /^(Item Weight|Product Weight|Package Weight|Weight)\s*[:\s]*/i;

/** ounce, pound, kg, g, lb, oz and their plural/long forms, not inside a word */
export const WEIGHT_UNIT =
  /(?<![a-z])(ounces?|pounds?|kilograms?|kgs?|grams?|g|lbs?|oz)(?![a-z])/i;
