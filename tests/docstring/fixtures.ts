export const GOOGLE_DOC = `Fetch rows from a table.

    Args:
        table (str): Table name.
        limit (int, optional): Row cap. Continuation lines are
            indented further.
        *args: Extra filters.

    Returns:
        list: The rows.

    Raises:
        KeyError: If the table does not exist.
    `;

export const NUMPY_DOC = `Fetch rows from a table.

    Parameters
    ----------
    table : str
        Table name.
    limit, offset : int, optional
        Paging controls.

    Returns
    -------
    list
        The rows.

    Raises
    ------
    KeyError
        If the table does not exist.
    `;

export const SPHINX_DOC = `Fetch rows from a table.

    :param str table: Table name.
    :param limit: Row cap,
        continued.
    :type limit: int, optional
    :returns: The rows.
    :rtype: list
    :raises KeyError: If the table does not exist.
    `;
