type FilterBarProps = {
  relays: string[];
  relay: string;
  startNrs: string[];
  selectedStartNrs: string[];
  onRelayChange: (relay: string) => void;
  onStartNrsChange: (startNrs: string[]) => void;
};

export const FilterBar = ({
  relays,
  relay,
  startNrs,
  selectedStartNrs,
  onRelayChange,
  onStartNrsChange
}: FilterBarProps) => {
  const toggle = (value: string) => {
    onStartNrsChange(
      selectedStartNrs.includes(value)
        ? selectedStartNrs.filter((item) => item !== value)
        : startNrs.filter((item) => item === value || selectedStartNrs.includes(item))
    );
  };

  return (
    <div className="filter-bar">
      {relays.length > 0 && (
        <label>
          Relay
          <select value={relay} onChange={(event) => onRelayChange(event.target.value)}>
            <option value="">All relays</option>
            {relays.map((value) => (
              <option key={value} value={value}>
                {value}
              </option>
            ))}
          </select>
        </label>
      )}
      <fieldset>
        <legend>Start numbers</legend>
        <div className="actions">
          <button type="button" onClick={() => onStartNrsChange(startNrs)}>
            All
          </button>
          <button type="button" onClick={() => onStartNrsChange([])}>
            None
          </button>
        </div>
        {startNrs.map((value) => (
          <label key={value} className="checkbox">
            <input
              type="checkbox"
              checked={selectedStartNrs.includes(value)}
              onChange={() => toggle(value)}
            />
            {value}
          </label>
        ))}
      </fieldset>
    </div>
  );
};
