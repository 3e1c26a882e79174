import type { AxiosInstance } from "axios";
import { SheetsRecordLoader } from "~/loaders/sheets";

const SHEET_URL =
  "https://sheets.googleapis.com/v4/spreadsheets/sheet-123/values";

const sheetValues: Record<string, unknown> = {
  [`${SHEET_URL}/Plants!A%3AQ`]: {
    range: "Plants!A1:C4",
    values: [
      ["ID", "Plant Name", "Light Requirements"],
      ["1", "Vinca", "Full Sun"],
      ["", "Ghost row"],
      ["2", "Hostas"],
    ],
  },
  [`${SHEET_URL}/Locations!A%3AH`]: {
    values: [
      [
        "Location ID",
        "Location Name",
        "Morning Sun Hours",
        "Afternoon Sun Hours",
        "Evening Sun Hours",
        "Total Sun Hours",
      ],
      ["L1", "Patio", "2", "5", "1"],
    ],
  },
  [`${SHEET_URL}/Containers!A%3AF`]: { range: "Containers!A1:F1" },
};

function fakeHttp(responses: Record<string, unknown>) {
  const get = jest.fn(async (url: string) => ({ data: responses[url] }));
  return { get, http: { get } as unknown as AxiosInstance };
}

describe("SheetsRecordLoader", () => {
  test("keeps plant headers and skips rows without an ID", async () => {
    const { get, http } = fakeHttp(sheetValues);
    const loader = new SheetsRecordLoader({
      spreadsheetId: "sheet-123",
      apiKey: "test-secret",
      http,
    });

    expect(await loader.loadPlants()).toEqual([
      { ID: "1", "Plant Name": "Vinca", "Light Requirements": "Full Sun" },
      { ID: "2", "Plant Name": "Hostas", "Light Requirements": "" },
    ]);
    expect(get).toHaveBeenCalledWith(`${SHEET_URL}/Plants!A%3AQ`, {
      params: { key: "test-secret" },
    });
  });

  test("snake_cases location headers and fills in total sun hours", async () => {
    const { http } = fakeHttp(sheetValues);
    const loader = new SheetsRecordLoader({
      spreadsheetId: "sheet-123",
      apiKey: "test-secret",
      http,
    });

    expect(await loader.loadLocations()).toEqual([
      {
        location_id: "L1",
        location_name: "Patio",
        morning_sun_hours: "2",
        afternoon_sun_hours: "5",
        evening_sun_hours: "1",
        total_sun_hours: 8,
      },
    ]);
  });

  test("treats a range without values as an empty table", async () => {
    const { http } = fakeHttp(sheetValues);
    const loader = new SheetsRecordLoader({
      spreadsheetId: "sheet-123",
      apiKey: "test-secret",
      http,
    });

    expect(await loader.loadContainers()).toEqual([]);
  });

  test("reads custom ranges", async () => {
    const { get, http } = fakeHttp({
      [`${SHEET_URL}/Pots!A%3AZ`]: { values: [["Container ID"], ["C1"]] },
    });
    const loader = new SheetsRecordLoader({
      spreadsheetId: "sheet-123",
      apiKey: "test-secret",
      ranges: { containers: "Pots!A:Z" },
      http,
    });

    expect(await loader.loadContainers()).toEqual([{ container_id: "C1" }]);
    expect(get).toHaveBeenCalledTimes(1);
  });

  test("rejects a malformed API response", async () => {
    const { http } = fakeHttp({
      [`${SHEET_URL}/Plants!A%3AQ`]: { values: "not a grid" },
    });
    const loader = new SheetsRecordLoader({
      spreadsheetId: "sheet-123",
      apiKey: "test-secret",
      http,
    });

    await expect(loader.loadPlants()).rejects.toThrow();
  });
});
