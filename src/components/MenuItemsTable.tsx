import { useEffect, useState } from "react";
import { priceOptionCount, type MenuItemEdit } from "../lib/editor";
import { DIETARY_LABELS } from "../lib/menuItems";
import type { MenuItem } from "../types";

interface MenuItemsTableProps {
  items: MenuItem[];
  disabled: boolean;
  onEdit: (itemId: string, edit: MenuItemEdit) => boolean;
  onRemove: (itemId: string) => void;
}

interface EditableCellProps {
  value: string;
  label: string;
  disabled: boolean;
  numeric?: boolean;
  multiline?: boolean;
  onCommit: (value: string) => boolean;
}

function EditableCell({
  value,
  label,
  disabled,
  numeric = false,
  multiline = false,
  onCommit,
}: EditableCellProps): JSX.Element {
  const [draft, setDraft] = useState(value);

  useEffect(() => {
    setDraft(value);
  }, [value]);

  function commit(): void {
    if (draft === value) return;
    // A rejected edit snaps back to the stored value.
    if (!onCommit(draft)) {
      setDraft(value);
    }
  }

  if (multiline) {
    return (
      <textarea
        aria-label={label}
        value={draft}
        rows={2}
        onChange={(event) => setDraft(event.target.value)}
        onBlur={commit}
        disabled={disabled}
      />
    );
  }

  return (
    <input
      aria-label={label}
      value={draft}
      inputMode={numeric ? "decimal" : undefined}
      onChange={(event) => setDraft(event.target.value)}
      onBlur={commit}
      onKeyDown={(event) => {
        if (event.key === "Enter") commit();
        if (event.key === "Escape") setDraft(value);
      }}
      disabled={disabled}
    />
  );
}

export default function MenuItemsTable({
  items,
  disabled,
  onEdit,
  onRemove,
}: MenuItemsTableProps): JSX.Element {
  if (items.length === 0) {
    return <p className="muted">No menu items extracted yet.</p>;
  }

  return (
    <div className="table-scroll">
      <table className="menu-table">
        <thead>
          <tr>
            <th>Name</th>
            <th>Description</th>
            <th>Dietary</th>
            <th>Price options</th>
            <th>Source</th>
            <th aria-label="Row actions" />
          </tr>
        </thead>
        <tbody>
          {items.map((item) => {
            const options = priceOptionCount(item);
            return (
              <tr key={item.id} className={item.flags.length > 0 ? "flagged" : ""}>
                <td>
                  <EditableCell
                    label={`Name of ${item.name}`}
                    value={item.name}
                    disabled={disabled}
                    onCommit={(value) => onEdit(item.id, { kind: "name", value })}
                  />
                  {item.flags.map((flag) => (
                    <small key={flag} className="alert warning">
                      {flag}
                    </small>
                  ))}
                </td>
                <td>
                  <EditableCell
                    label={`Description of ${item.name}`}
                    value={item.description}
                    multiline
                    disabled={disabled}
                    onCommit={(value) =>
                      onEdit(item.id, { kind: "description", value })
                    }
                  />
                </td>
                <td>
                  <select
                    aria-label={`Dietary label of ${item.name}`}
                    value={item.dietary_label}
                    onChange={(event) =>
                      onEdit(item.id, {
                        kind: "dietary_label",
                        value: event.target.value,
                      })
                    }
                    disabled={disabled}
                  >
                    {DIETARY_LABELS.map((label) => (
                      <option key={label} value={label}>
                        {label}
                      </option>
                    ))}
                  </select>
                </td>
                <td>
                  <div className="price-options">
                    {Array.from({ length: options }, (_, index) => (
                      <div key={index} className="price-option">
                        <EditableCell
                          label={`Price label ${index + 1} of ${item.name}`}
                          value={item.price_labels[index] ?? ""}
                          disabled={disabled}
                          onCommit={(value) =>
                            onEdit(item.id, { kind: "price_label", index, value })
                          }
                        />
                        <EditableCell
                          label={`Price ${index + 1} of ${item.name}`}
                          value={
                            item.prices[index] === undefined
                              ? ""
                              : String(item.prices[index])
                          }
                          numeric
                          disabled={disabled}
                          onCommit={(value) =>
                            onEdit(item.id, { kind: "price", index, value })
                          }
                        />
                        <button
                          type="button"
                          onClick={() =>
                            onEdit(item.id, { kind: "remove_price_option", index })
                          }
                          disabled={disabled}
                          aria-label={`Remove price option ${index + 1} of ${item.name}`}
                        >
                          ×
                        </button>
                      </div>
                    ))}
                    <button
                      type="button"
                      onClick={() => onEdit(item.id, { kind: "add_price_option" })}
                      disabled={disabled}
                    >
                      Add price
                    </button>
                  </div>
                </td>
                <td>
                  <small>{item.source}</small>
                </td>
                <td>
                  <button
                    type="button"
                    onClick={() => onRemove(item.id)}
                    disabled={disabled}
                  >
                    Remove
                  </button>
                </td>
              </tr>
            );
          })}
        </tbody>
      </table>
    </div>
  );
}
