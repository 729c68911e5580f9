import request from "supertest";
import { beforeEach, describe, it, expect, vi } from "vitest";

const svc = vi.hoisted(() => ({
  svcListNotifications: vi.fn(),
  svcMarkAllNotificationsRead: vi.fn(),
  svcMarkNotificationRead: vi.fn(),
}));

vi.mock("pg", () => ({
  Pool: vi.fn(() => ({ on: vi.fn(), query: vi.fn(), connect: vi.fn() })),
}));

vi.mock("../module/notifications/services/notifications.service", () => svc);

import app from "../config/app";
import { bearer } from "./helpers/tokens";

beforeEach(() => {
  vi.resetAllMocks();
});

describe("/api/v1/notifications", () => {
  it("lists a driver's own notifications only", async () => {
    svc.svcListNotifications.mockResolvedValueOnce({ items: [], total: 0, unread: 0 });

    const res = await request(app).get("/api/v1/notifications?unread=true").set("Authorization", bearer("chauffeur"));

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ items: [], total: 0, unread: 0 });
    expect(svc.svcListNotifications).toHaveBeenCalledWith(
      { userId: 7, staff: false },
      expect.objectContaining({ unread: true, page: 1 })
    );
  });

  it("includes staff broadcasts for agents", async () => {
    svc.svcMarkAllNotificationsRead.mockResolvedValueOnce(3);

    const res = await request(app).post("/api/v1/notifications/read-all").set("Authorization", bearer("agent"));

    expect(res.body).toEqual({ updated: 3 });
    expect(svc.svcMarkAllNotificationsRead).toHaveBeenCalledWith({ userId: 4, staff: true });
  });

  it("answers 404 for someone else's notification", async () => {
    svc.svcMarkNotificationRead.mockResolvedValueOnce(null);

    const res = await request(app).post("/api/v1/notifications/55/read").set("Authorization", bearer("chauffeur"));

    expect(res.status).toBe(404);
    expect(res.body.error).toBe("NOTIFICATION_NOT_FOUND");
    expect(svc.svcMarkNotificationRead).toHaveBeenCalledWith({ userId: 7, staff: false }, 55);
  });
});
