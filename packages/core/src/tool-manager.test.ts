import { beforeEach, describe, expect, it, vi } from 'vitest';
import { EventBusImpl } from './event-bus';
import { ToolIds, ToolManager } from './tool-manager';

describe('ToolManager', () => {
  let bus: EventBusImpl;
  let tools: ToolManager;

  beforeEach(() => {
    bus = new EventBusImpl();
    tools = new ToolManager(bus);
  });

  it('starts with no active tool', () => {
    expect(tools.activeToolId).toBeNull();
  });

  describe('activate', () => {
    it('marks the tool active and publishes change and panel events', () => {
      const events: string[] = [];
      bus.on('tool:changed', ({ previous, current }) => events.push(`changed:${previous}->${current}`));
      bus.on('tool:panel-toggled', ({ toolId, isActive }) => events.push(`panel:${toolId}:${isActive}`));

      tools.activate(ToolIds.Crop);
      tools.activate(ToolIds.Drawing);

      expect(tools.activeToolId).toBe('drawing');
      expect(events).toEqual([
        'changed:null->crop',
        'panel:crop:true',
        'changed:crop->drawing',
        'panel:crop:false',
        'panel:drawing:true',
      ]);
    });

    it('runs the previous tool cleanup exactly once before switching', () => {
      const order: string[] = [];
      tools.registerDeactivationCallback('crop', () => order.push(`cleanup, active=${tools.activeToolId}`));
      bus.on('tool:changed', ({ current }) => order.push(`changed:${current}`));

      tools.activate('crop');
      tools.activate('drawing');

      expect(order).toEqual(['changed:crop', 'cleanup, active=crop', 'changed:drawing']);
    });

    it('is a no-op when the tool is already active', () => {
      const cleanup = vi.fn();
      const changed = vi.fn();
      tools.registerDeactivationCallback('crop', cleanup);
      tools.activate('crop');
      bus.on('tool:changed', changed);

      tools.activate('crop');

      expect(cleanup).not.toHaveBeenCalled();
      expect(changed).not.toHaveBeenCalled();
    });

    it('rejects blank ids', () => {
      expect(() => tools.activate('')).toThrow('Tool id must be a non-empty string');
      expect(() => tools.deactivate('  ')).toThrow();
      expect(() => tools.registerDeactivationCallback('', vi.fn())).toThrow();
    });
  });

  describe('deactivate', () => {
    it('ignores tools that are not active', () => {
      const cleanup = vi.fn();
      tools.registerDeactivationCallback('crop', cleanup);
      tools.activate('drawing');

      tools.deactivate('crop');

      expect(cleanup).not.toHaveBeenCalled();
      expect(tools.activeToolId).toBe('drawing');
    });

    it('clears the active tool and publishes (id -> null)', () => {
      const changed = vi.fn();
      const panel = vi.fn();
      const cleanup = vi.fn();
      tools.registerDeactivationCallback('crop', cleanup);
      tools.activate('crop');
      bus.on('tool:changed', changed);
      bus.on('tool:panel-toggled', panel);

      tools.deactivate('crop');

      expect(tools.activeToolId).toBeNull();
      expect(cleanup).toHaveBeenCalledOnce();
      expect(changed).toHaveBeenCalledWith({ previous: 'crop', current: null });
      expect(panel).toHaveBeenCalledWith({ toolId: 'crop', isActive: false });
    });
  });

  it('toggles between active and inactive', () => {
    tools.toggle('crop');
    expect(tools.isActive('crop')).toBe(true);
    tools.toggle('crop');
    expect(tools.activeToolId).toBeNull();
  });

  it('deactivateAll deactivates whatever is active', () => {
    const changed = vi.fn();
    tools.activate('color-balance');
    bus.on('tool:changed', changed);

    tools.deactivateAll();
    tools.deactivateAll();

    expect(tools.activeToolId).toBeNull();
    expect(changed).toHaveBeenCalledOnce();
  });

  it('reports at most one active tool across any sequence', () => {
    const ids = ['crop', 'drawing', 'crop', 'color-balance', 'drawing'];
    for (const id of ids) {
      tools.toggle(id);
      const active = ids.filter((candidate) => tools.isActive(candidate));
      expect(new Set(active).size).toBeLessThanOrEqual(1);
    }
  });

  it('replaces an earlier deactivation callback', () => {
    const first = vi.fn();
    const second = vi.fn();
    tools.registerDeactivationCallback('crop', first);
    tools.registerDeactivationCallback('crop', second);
    tools.activate('crop');
    tools.deactivateAll();
    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledOnce();
  });
});
