import { describe, expect, test } from "vitest";

import {
  categoryDirectory,
  classify,
  parseSequenceNumber,
} from "@/services/FileNameParser";

describe("parseSequenceNumber", () => {
  test("取出檔名中的流水號", () => {
    expect(parseSequenceNumber("IMG_1234.JPG")).toBe(1234n);
    expect(parseSequenceNumber("DSC05678.cr3")).toBe(5678n);
    expect(parseSequenceNumber("IMG_0012.jpg")).toBe(12n);
  });

  test("有多段數字時取第一段", () => {
    expect(parseSequenceNumber("2024_trip_7.jpg")).toBe(2024n);
    expect(parseSequenceNumber("IMG_12.345.jpg")).toBe(12n);
  });

  test("超過 Number 精度的長數字仍保留原值", () => {
    expect(parseSequenceNumber("100000000000000001.jpg")).toBe(
      100000000000000001n
    );
  });

  test("副檔名中的數字不計入", () => {
    expect(parseSequenceNumber("cover.mp4")).toBeUndefined();
  });

  test("沒有數字回傳 undefined", () => {
    expect(parseSequenceNumber("cover.jpg")).toBeUndefined();
    expect(parseSequenceNumber("README")).toBeUndefined();
  });
});

describe("classify", () => {
  test("副檔名大小寫不敏感", () => {
    expect(classify("IMG_1.JPEG")).toBe("JPEG");
    expect(classify("img_2.jpeg")).toBe("JPEG");
    expect(classify("IMG_3.Jpg")).toBe("JPEG");
    expect(classify("IMG_4.CR3")).toBe("RAW");
    expect(classify("IMG_5.cr3")).toBe("RAW");
  });

  test("其他副檔名為 UNKNOWN", () => {
    expect(classify("IMG_6.png")).toBe("UNKNOWN");
    expect(classify("IMG_7.NEF")).toBe("UNKNOWN");
    expect(classify("notes")).toBe("UNKNOWN");
  });

  test("分類資料夾名稱固定為 JPG 與 RAW", () => {
    expect(categoryDirectory("JPEG")).toBe("JPG");
    expect(categoryDirectory("RAW")).toBe("RAW");
  });
});
