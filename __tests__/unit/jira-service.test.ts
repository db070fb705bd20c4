import { describe, it, expect, jest, beforeEach } from "@jest/globals";
import axios from "axios";
import { JiraService } from "../../src/services/jira-service";
import { makeIssue } from "../helpers/fixtures";

jest.mock("axios", () => {
  const get = jest.fn();
  const isAxiosError = (error: unknown): boolean =>
    typeof error === "object" && error !== null && "isAxiosError" in error;
  return { __esModule: true, default: { get, isAxiosError } };
});

const mockedGet = jest.mocked(axios.get);

const jiraConfig = {
  url: "https://example.atlassian.net",
  username: "user@example.com",
  token: "test-token",
  pageSize: 2,
};

function createService(categorySource: "labels" | "customfield" = "labels"): JiraService {
  return new JiraService(jiraConfig, {
    storyPointsField: "customfield_10026",
    categorySource,
    customFieldId: "customfield_20000",
  });
}

describe("JiraService", () => {
  beforeEach(() => {
    mockedGet.mockReset();
  });

  describe("buildJql", () => {
    const service = createService();

    it("filters by projects, the current week and statuses", () => {
      expect(
        service.buildJql({ projects: ["YTCS", "DS"], statuses: ["DONE", "QA RELEASE"] })
      ).toBe(
        '(project = "YTCS" OR project = "DS") AND updated >= startOfWeek() AND updated <= endOfWeek() AND (status = "DONE" OR status = "QA RELEASE")'
      );
    });

    it("shifts to last week and omits an empty status filter", () => {
      expect(service.buildJql({ projects: ["DS"], statuses: [], week: "previous" })).toBe(
        '(project = "DS") AND updated >= startOfWeek(-1) AND updated <= endOfWeek(-1)'
      );
    });
  });

  it("requests the custom field only in customfield mode", () => {
    expect(createService("labels").fields).toBe(
      "assignee,labels,updated,components,status,customfield_10026"
    );
    expect(createService("customfield").fields).toBe(
      "assignee,labels,updated,components,status,customfield_10026,customfield_20000"
    );
  });

  it("follows page tokens until the last page", async () => {
    mockedGet
      .mockResolvedValueOnce({
        data: { issues: [makeIssue("YTCS-1"), makeIssue("YTCS-2")], nextPageToken: "page-2", isLast: false },
      })
      .mockResolvedValueOnce({
        data: { issues: [makeIssue("DS-1")], isLast: true },
      });

    const issues = await createService().fetchIssues({ projects: ["YTCS", "DS"], statuses: [] });

    expect(issues.map((issue) => issue.key)).toEqual(["YTCS-1", "YTCS-2", "DS-1"]);
    expect(mockedGet).toHaveBeenCalledTimes(2);

    const [url, firstConfig] = mockedGet.mock.calls[0];
    expect(url).toBe("https://example.atlassian.net/rest/api/3/search/jql");
    expect(firstConfig).toMatchObject({
      headers: {
        Authorization: `Basic ${Buffer.from("user@example.com:test-token").toString("base64")}`,
        Accept: "application/json",
      },
      params: { maxResults: 2 },
    });
    expect(mockedGet.mock.calls[1][1]).toMatchObject({ params: { nextPageToken: "page-2" } });
  });

  it("stops on an empty page even when a token is returned", async () => {
    mockedGet.mockResolvedValueOnce({ data: { issues: [], nextPageToken: "again" } });

    const issues = await createService().fetchIssues({ projects: ["DS"], statuses: [] });

    expect(issues).toEqual([]);
    expect(mockedGet).toHaveBeenCalledTimes(1);
  });

  it("reports the HTTP status of a failed request", async () => {
    mockedGet.mockRejectedValueOnce({
      isAxiosError: true,
      message: "Request failed with status code 401",
      response: { status: 401 },
    });

    await expect(
      createService().fetchIssues({ projects: ["DS"], statuses: [] })
    ).rejects.toThrow("Jira API error 401: Request failed with status code 401");
  });

  it("refuses to search without projects", async () => {
    await expect(createService().fetchIssues({ projects: [], statuses: [] })).rejects.toThrow(
      "At least one project key is required to fetch issues"
    );
    expect(mockedGet).not.toHaveBeenCalled();
  });
});
