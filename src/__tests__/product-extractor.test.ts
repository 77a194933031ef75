import { describe, it, expect } from "vitest";
import {
  cleanBrand,
  cleanText,
  disambiguateDetailRows,
  extractProduct,
} from "../product-extractor";

const PRODUCT_URL = "https://www.example.com/Adjustable-Desk-Lamp/dp/B0LAMP0001/ref=sr_1_1";

const DETAIL_PAGE = `
<html><body>
  <span id="productTitle">
    Adjustable   LED Desk Lamp\u200e
  </span>
  <a id="bylineInfo" href="/stores/Lumina">Visit the Lumina Store</a>
  <div class="a-price"><span class="a-offscreen">$29.99</span></div>
  <span data-hook="rating-out-of-text">4.5 out of 5</span>
  <span id="acrCustomerReviewText">1,234 ratings</span>
  <div id="feature-bullets"><ul>
    <li><span class="a-list-item"> Three brightness levels </span></li>
    <li><span class="a-list-item">   </span></li>
    <li><span class="a-list-item">USB charging port</span></li>
  </ul></div>
  <div id="wayfinding-breadcrumbs_feature_div"><ul>
    <li><a href="/home">Home &amp; Kitchen</a></li>
    <li class="divider">›</li>
    <li><a href="/lighting"> Lighting </a></li>
  </ul></div>
  <img id="landingImage" src="https://images.example.com/lamp.jpg">
  <input type="hidden" name="ASIN" value="B0FORM0001">
  <table class="prodDetTable">
    <tr><th>Product Dimensions</th><td>10 x 5 x 2 inches; 2.2 pounds</td></tr>
    <tr><th>Item Weight</th><td>3 pounds</td></tr>
  </table>
</body></html>`;

describe("extractProduct", () => {
  it("reads every field of a complete detail page", () => {
    expect(extractProduct(DETAIL_PAGE, PRODUCT_URL)).toEqual({
      identifier: "B0LAMP0001",
      title: "Adjustable LED Desk Lamp",
      brand: "Lumina",
      price: "$29.99",
      rating: "4.5 out of 5",
      review_count: "1,234 ratings",
      bullet_features: ["Three brightness levels", "USB charging port"],
      breadcrumbs: ["Home & Kitchen", "Lighting"],
      dimensions: "10 x 5 x 2 inches",
      weight: "2.2 pounds",
      image_url: "https://images.example.com/lamp.jpg",
      source_url: PRODUCT_URL,
    });
  });

  it("takes the identifier from the PRODUCT_URL even when the form input disagrees", () => {
    expect(extractProduct(DETAIL_PAGE, PRODUCT_URL).identifier).toBe("B0LAMP0001");
  });

  it("falls back to the form input when the PRODUCT_URL has no code", () => {
    const record = extractProduct(DETAIL_PAGE, "https://www.example.com/gp/product?id=7");
    expect(record.identifier).toBe("B0FORM0001");
  });

  it("walks the price and rating chains until one yields text", () => {
    const html = `
      <div class="a-price"><span class="a-offscreen">  </span></div>
      <span id="priceblock_dealprice">$19.00</span>
      <i class="a-icon-star"><span>4.1 out of 5 stars</span></i>`;

    const record = extractProduct(html, PRODUCT_URL);

    expect(record.price).toBe("$19.00");
    expect(record.rating).toBe("4.1 out of 5 stars");
  });

  it("uses og:title when the title elements are missing", () => {
    const html = `<html><head><meta property="og:title" content="Clamp Lamp"></head><body></body></html>`;
    expect(extractProduct(html, PRODUCT_URL).title).toBe("Clamp Lamp");
  });

  it("produces a valid record with every optional field absent", () => {
    const sourceUrl = "https://www.example.com/some/page";
    const record = extractProduct("<html><body></body></html>", sourceUrl);

    expect(record.title).toBeUndefined();
    expect(record.identifier).toBeUndefined();
    expect(record.dimensions).toBeUndefined();
    expect(record.weight).toBeUndefined();
    expect(JSON.parse(JSON.stringify(record))).toEqual({
      bullet_features: [],
      breadcrumbs: [],
      source_url: sourceUrl,
    });
  });

  it("returns a frozen record", () => {
    const record = extractProduct(DETAIL_PAGE, PRODUCT_URL);
    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.bullet_features)).toBe(true);
  });

  it("reads detail bullets with direction marks", () => {
    const html = `
      <div id="detailBullets_feature_div"><ul>
        <li><span class="a-list-item"><span class="a-text-bold">Product Dimensions \u200f : \u200e</span><span>8 x 4 x 3 inches; 12 Ounces</span></span></li>
      </ul></div>`;

    const record = extractProduct(html, PRODUCT_URL);

    expect(record.dimensions).toBe("8 x 4 x 3 inches");
    expect(record.weight).toBe("12 Ounces");
  });

  it("scans containers in listed order, not document order", () => {
    const html = `
      <div id="detailBullets_feature_div"><ul><li>Dimensions: 1 x 1 x 1 cm</li></ul></div>
      <table class="prodDetTable"><tr><th>Item Dimensions</th><td>9 x 9 x 9 cm</td></tr></table>`;

    expect(extractProduct(html, PRODUCT_URL).dimensions).toBe("9 x 9 x 9 cm");
  });
});

describe("disambiguateDetailRows", () => {
  it("moves a weight clause out of a combined dimensions row", () => {
    expect(
      disambiguateDetailRows(["Product Dimensions: 10 x 5 x 2 inches ; 2.2 pounds"])
    ).toEqual({ dimensions: "10 x 5 x 2 inches", weight: "2.2 pounds" });
  });

  it("fills dimensions and weight from separate rows", () => {
    expect(disambiguateDetailRows(["Dimensions: 5x5x5 cm", "Item Weight: 500 g"])).toEqual({
      dimensions: "5x5x5 cm",
      weight: "500 g",
    });
  });

  it("keeps the first dimensions value", () => {
    expect(
      disambiguateDetailRows([
        "Item Dimensions: 1 x 1 x 1 in",
        "Package Dimensions: 2 x 2 x 2 in",
      ]).dimensions
    ).toBe("1 x 1 x 1 in");
  });

  it("keeps the first weight row", () => {
    expect(
      disambiguateDetailRows(["Item Weight: 1 pound", "Package Weight: 2 pounds"]).weight
    ).toBe("1 pound");
  });

  it("lets a weight embedded in a dimensions row replace an earlier weight row", () => {
    expect(
      disambiguateDetailRows([
        "Item Weight: 3 pounds",
        "Package Dimensions: 12 x 8 x 4 inches; 3.5 Pounds",
      ])
    ).toEqual({ dimensions: "12 x 8 x 4 inches", weight: "3.5 Pounds" });
  });

  it("keeps the whole text when the second clause is not a weight", () => {
    expect(disambiguateDetailRows(["Size: 10 x 20 cm; Blue"])).toEqual({
      dimensions: "10 x 20 cm; Blue",
      weight: undefined,
    });
  });

  it("ignores rows that are neither", () => {
    expect(disambiguateDetailRows(["Color: Black", "Material: Aluminum"])).toEqual({
      dimensions: undefined,
      weight: undefined,
    });
  });
});

describe("text cleanup", () => {
  it("strips direction marks and collapses whitespace", () => {
    expect(cleanText("\u200f  Soft \n\t white\u200e  ")).toBe("Soft white");
    expect(cleanText(" \u200e ")).toBeUndefined();
  });

  it("removes brand labels and store wording", () => {
    expect(cleanBrand("Brand: Acme")).toBe("Acme");
    expect(cleanBrand("brand:Acme")).toBe("Acme");
    expect(cleanBrand("Visit the Lumina Store")).toBe("Lumina");
    expect(cleanBrand("Lumina")).toBe("Lumina");
  });
});
